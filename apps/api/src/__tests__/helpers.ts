import { type FastifyInstance } from 'fastify';
import { type TokenResponse, type UserResponse, type EventResponse } from '@soiree/proto';

export function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

export async function login(app: FastifyInstance, username: string, password = 'secret1') {
  return app.inject({
    method: 'POST',
    url: '/auth/login',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    payload: new URLSearchParams({ username, password }).toString(),
  });
}

/** Signs a user up and logs them in. */
export async function registerUser(
  app: FastifyInstance,
  username: string,
  email: string,
  password = 'secret1',
): Promise<{ id: number; token: string }> {
  const signup = await app.inject({
    method: 'POST',
    url: '/auth/signup',
    payload: { username, email, password },
  });
  const user = signup.json<UserResponse>();
  const res = await login(app, username, password);
  return { id: user.id, token: res.json<TokenResponse>().access_token };
}

export async function createEvent(
  app: FastifyInstance,
  token: string,
  body: Record<string, unknown> = { title: 'Party', date: '2026-12-31T20:00:00Z', location: 'Home' },
): Promise<EventResponse> {
  const res = await app.inject({ method: 'POST', url: '/events/', headers: bearer(token), payload: body });
  return res.json<EventResponse>();
}
