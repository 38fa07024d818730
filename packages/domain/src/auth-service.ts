import { type User, type PublicUser, toPublicUser } from './user';
import { type UserRepository, type PasswordHasher, type TokenService, type WithTransaction } from './ports';

export interface AuthServiceDeps<Tx> {
  userRepo: UserRepository<Tx>;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  withTransaction: WithTransaction<Tx>;
}

export interface LoginResult {
  accessToken: string;
  user: PublicUser;
}

export class AuthService<Tx> {
  constructor(private readonly deps: AuthServiceDeps<Tx>) {}

  async signup(input: { username: string; email: string; password: string }): Promise<PublicUser> {
    const { userRepo, passwordHasher } = this.deps;

    // hashed outside the transaction so no pooled connection waits on argon2
    const passwordHash = await passwordHasher.hash(input.password);

    return this.deps.withTransaction(async (tx) => {
      const existing = await userRepo.findByUsernameOrEmail(tx, input.username, input.email);
      if (existing) {
        throw new AuthError('CONFLICT', 'Username or Email already exists.');
      }

      // null when a concurrent signup took the name after the check above
      const user = await userRepo.create(tx, {
        username: input.username,
        email: input.email,
        passwordHash,
      });
      if (!user) {
        throw new AuthError('CONFLICT', 'Username or Email already exists.');
      }

      return toPublicUser(user);
    });
  }

  async login(input: { username: string; password: string }): Promise<LoginResult> {
    const { userRepo, passwordHasher, tokenService } = this.deps;

    const user = await this.deps.withTransaction((tx) => userRepo.findByUsername(tx, input.username));
    if (!user) {
      throw new AuthError('UNAUTHORIZED', 'Incorrect username or password');
    }

    const valid = await passwordHasher.verify(input.password, user.passwordHash);
    if (!valid) {
      throw new AuthError('UNAUTHORIZED', 'Incorrect username or password');
    }

    const accessToken = await tokenService.signAccessToken(user.id);
    return { accessToken, user: toPublicUser(user) };
  }

  /**
   * Resolves a bearer token to the user it names. Fails the same way for a bad
   * token and for a user that no longer exists.
   */
  async authenticate(token: string): Promise<User> {
    let userId: number;
    try {
      ({ userId } = await this.deps.tokenService.verifyAccessToken(token));
    } catch {
      throw new AuthError('UNAUTHORIZED', 'Could not validate credentials');
    }

    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findById(tx, userId));
    if (!user) {
      throw new AuthError('UNAUTHORIZED', 'Could not validate credentials');
    }
    return user;
  }
}

export class AuthError extends Error {
  constructor(
    public readonly kind: 'UNAUTHORIZED' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
