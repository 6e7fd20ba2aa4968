import { NotLoggedInError } from './errors.js';

/**
 * The signed-in user as seen by the external auth collaborator.
 */
export interface AuthProvider {
  currentUserId(): string | null;
}

export class StaticAuthProvider implements AuthProvider {
  constructor(private userId: string | null = null) {}

  currentUserId(): string | null {
    return this.userId;
  }

  setUser(userId: string | null): void {
    this.userId = userId;
  }
}

export function resolveUserId(auth: AuthProvider, explicit?: string): string {
  const userId = explicit ?? auth.currentUserId();
  if (!userId) {
    throw new NotLoggedInError();
  }
  return userId;
}
