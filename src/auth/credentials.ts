import type { AccountId } from '../types/account';
import type { AccountStore } from '../storage/interfaces';
import { DuplicateIdentityError, InvalidCredentialsError } from '../errors';
import { DEFAULT_CYCLE_PLAN, planCycle, type CyclePlan } from '../billing/cycle';
import { hashPassword, verifyPassword } from './password';

export interface CredentialService {
  register(email: string, password: string): Promise<AccountId>;
  authenticate(email: string, password: string): Promise<AccountId>;
}

export interface CredentialServiceOptions {
  accountStore: AccountStore;
  plan?: CyclePlan;
  now?: () => Date;
}

export function createCredentialService(options: CredentialServiceOptions): CredentialService {
  const { accountStore } = options;
  const plan = options.plan ?? DEFAULT_CYCLE_PLAN;
  const now = options.now ?? (() => new Date());

  // Verified against when the email is unknown, so a miss costs the same
  // PBKDF2 round as a wrong password.
  let dummyHash: Promise<string> | undefined;
  const getDummyHash = () => (dummyHash ??= hashPassword('unknown-account'));

  return {
    async register(email, password) {
      if (await accountStore.findByEmail(email)) {
        throw new DuplicateIdentityError();
      }

      const createdAt = now();
      const passwordHash = await hashPassword(password);
      // The store re-checks uniqueness inside its atomic create.
      const { account } = await accountStore.createWithCycle(
        { email, passwordHash, createdAt },
        planCycle(createdAt, plan)
      );
      return account.id;
    },

    async authenticate(email, password) {
      const account = await accountStore.findByEmail(email);
      const valid = await verifyPassword(password, account?.passwordHash ?? (await getDummyHash()));

      if (!account || !valid) {
        throw new InvalidCredentialsError();
      }
      return account.id;
    },
  };
}
