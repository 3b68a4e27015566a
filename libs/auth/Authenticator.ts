import type { Transaction } from '../db/types.js';
import { AccountLockedError, AuthenticationError } from '../errors/operationErrors.js';
import type { CriticalOperationExecutor } from '../execution/CriticalOperationExecutor.js';
import type { OperationResult, UnitOfWork } from '../execution/types.js';
import type { LockoutTracker } from '../guards/LockoutTracker.js';

export const LOGIN_ACTION = 'auth.login';

export interface LoginRequest<TAccount, TTx extends Transaction> {
    identity: string;
    ip: string;
    /** Resolves the account, or null when the credentials do not match. */
    verify: UnitOfWork<TAccount | null, TTx>;
}

export function loginIdentity(identity: string, ip: string): string {
    return `${identity}:${ip}`;
}

/**
 * Credential check run as a critical operation.
 *
 * Lockout is keyed on identity and source address together, so a flood from
 * one address cannot lock the account out for everyone else.
 */
export class Authenticator<TTx extends Transaction = Transaction> {
    constructor(
        private readonly executor: CriticalOperationExecutor<TTx>,
        private readonly lockout: LockoutTracker
    ) { }

    async login<TAccount>(request: LoginRequest<TAccount, TTx>): Promise<OperationResult<TAccount>> {
        const authIdentity = loginIdentity(request.identity, request.ip);

        return this.executor.execute<TAccount>(async scope => {
            const { lockedUntil } = await this.lockout.getState(authIdentity);
            if (lockedUntil) {
                throw new AccountLockedError(authIdentity, lockedUntil);
            }

            const account = await request.verify(scope);
            if (account === null) {
                throw new AuthenticationError();
            }
            return account;
        }, {
            actorId: `anonymous:${request.ip}`,
            action: LOGIN_ACTION,
            authIdentity,
            payload: { identity: request.identity, ip: request.ip }
        });
    }
}
