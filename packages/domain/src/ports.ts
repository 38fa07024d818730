import { type User } from './user';

export type WithTransaction<Tx> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

export interface UserRepository<Tx> {
  /** Resolves to null when the username or email is already taken. */
  create(tx: Tx, user: { username: string; email: string; passwordHash: string }): Promise<User | null>;
  findByUsername(tx: Tx, username: string): Promise<User | null>;
  findByUsernameOrEmail(tx: Tx, username: string, email: string): Promise<User | null>;
  findById(tx: Tx, id: number): Promise<User | null>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface TokenService {
  signAccessToken(userId: number): Promise<string>;
  verifyAccessToken(token: string): Promise<{ userId: number }>;
}
