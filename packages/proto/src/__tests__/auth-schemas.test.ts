import { describe, it, expect } from 'vitest';
import {
  UsernameSchema,
  PasswordSchema,
  SignupRequestSchema,
  LoginRequestSchema,
} from '../api/auth';
import { EmailSchema } from '../api/common';

describe('UsernameSchema', () => {
  it('trims surrounding whitespace', () => {
    expect(UsernameSchema.parse('  alice  ')).toBe('alice');
  });

  it('keeps case', () => {
    expect(UsernameSchema.parse('Alice')).toBe('Alice');
  });

  it('rejects empty', () => {
    expect(() => UsernameSchema.parse('   ')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => UsernameSchema.parse('a'.repeat(65))).toThrow();
  });
});

describe('EmailSchema', () => {
  it('normalizes to lowercase and trims', () => {
    expect(EmailSchema.parse('  Alice@X.com ')).toBe('alice@x.com');
  });

  it('rejects malformed addresses', () => {
    expect(() => EmailSchema.parse('alice')).toThrow();
    expect(() => EmailSchema.parse('alice@')).toThrow();
  });
});

describe('PasswordSchema', () => {
  it('rejects passwords shorter than 6 characters', () => {
    const result = PasswordSchema.safeParse('short');
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Password must be at least 6 characters');
  });

  it('accepts exactly 6 characters', () => {
    expect(PasswordSchema.parse('secret')).toBe('secret');
  });
});

describe('SignupRequestSchema', () => {
  it('validates a complete signup', () => {
    const result = SignupRequestSchema.parse({
      username: 'alice',
      email: 'Alice@X.com',
      password: 'secret1',
    });
    expect(result).toEqual({ username: 'alice', email: 'alice@x.com', password: 'secret1' });
  });

  it('requires email', () => {
    expect(() => SignupRequestSchema.parse({ username: 'alice', password: 'secret1' })).toThrow();
  });
});

describe('LoginRequestSchema', () => {
  it('ignores extra form fields', () => {
    const result = LoginRequestSchema.parse({ username: 'alice', password: 'x', grant_type: 'password' });
    expect(result).toEqual({ username: 'alice', password: 'x' });
  });

  it('requires a password', () => {
    expect(() => LoginRequestSchema.parse({ username: 'alice', password: '' })).toThrow();
  });
});
