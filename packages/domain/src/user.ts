export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
}

/** A user as it may leave the service boundary. */
export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
  return { id: user.id, username: user.username, email: user.email };
}
