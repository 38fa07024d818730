export { createLogger, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  DEFAULT_JWT_SECRET,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  ApiConfigSchema,
  InitDbConfigSchema,
} from './config';
export {
  Argon2PasswordHasher,
  DEFAULT_PASSWORD_HASHING,
  type PasswordHashingOptions,
} from './auth/password-hasher';
export { JoseTokenService } from './auth/token-service';
export { type TokenService, type PasswordHasher } from '@soiree/domain';
