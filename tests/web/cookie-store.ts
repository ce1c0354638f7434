import { vi } from 'vitest';

const jar = new Map<string, string>();

/** In-memory stand-in for the store `cookies()` from next/headers resolves to. */
export const cookieStore = {
  jar,
  get: vi.fn((name: string) => {
    const value = jar.get(name);
    return value === undefined ? undefined : { name, value };
  }),
  set: vi.fn((name: string, value: string, _options?: Record<string, unknown>) => {
    jar.set(name, value);
  }),
  delete: vi.fn((name: string) => {
    jar.delete(name);
  }),
};
