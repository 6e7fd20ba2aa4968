import { TABLES, type User } from '@fitledger/shared';
import type { RecordStore } from '../db/store.js';
import { moduleLogger } from '../logger.js';
import { failure, type Outcome, type SideEffectFailure } from '../outcome.js';
import { parseInput, signInSchema, type SignInInput } from '../validation.js';

const log = moduleLogger('AccountService');

export class AccountService {
  constructor(private readonly store: RecordStore) {}

  /**
   * Create the local user on first sign-in, refresh the last login after that.
   */
  async signIn(input: SignInInput): Promise<Outcome<User>> {
    const profile = parseInput(signInSchema, input);
    const now = new Date().toISOString();

    return this.store.exclusive(() => {
      const existing = this.store.getUser(profile.id);
      const user = this.store.transaction(() => {
        if (!existing) {
          return this.store.saveUser({ ...profile, registrationDate: now, lastLogin: now });
        }
        this.store.touchLastLogin(profile.id, now);
        return { ...existing, lastLogin: now };
      });

      const failures: SideEffectFailure[] = [];
      const queued = this.store.markForSync(TABLES.USERS, profile.id, existing ? 'UPDATE' : 'INSERT');
      if (!queued.ok) {
        failures.push(failure('changeQueue', queued.error));
      }

      log.info({ userId: profile.id, firstSignIn: !existing }, 'User signed in');
      return { value: user, failures };
    });
  }

  getUser(userId: string): User | null {
    return this.store.getUser(userId);
  }
}
