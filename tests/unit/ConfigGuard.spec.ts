import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard } from '../../libs/bootstrap/config-guard.js';
import type { GuardRule } from '../../libs/bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../../libs/bootstrap/config/db-config.js';
import { GuardConfigError } from '../../libs/bootstrap/config/guard-config.js';
import { createPool } from '../../libs/db/pool.js';

const DB_ENV = {
    DB_HOST: 'localhost',
    DB_PORT: '5432',
    DB_USER: 'guard',
    DB_PASSWORD: 'test-secret',
    DB_NAME: 'guard_test'
};

describe('ConfigGuard', () => {
    it('should report missing and blank required variables', () => {
        const rules: GuardRule[] = [
            { type: 'required', name: 'A' },
            { type: 'required', name: 'B' },
            { type: 'required', name: 'C' }
        ];

        const errors = ConfigGuard.check(rules, { A: 'set', B: '   ' });

        assert.deepStrictEqual(errors, [
            'FATAL CONFIG: Required env var B is missing',
            'FATAL CONFIG: Required env var C is missing'
        ]);
    });

    it('should evaluate forbidIf and assert rules', () => {
        const rules: GuardRule[] = [
            {
                type: 'forbidIf',
                name: 'NO_DEBUG_IN_PROD',
                when: env => env.NODE_ENV === 'production' && env.DEBUG === 'true',
                message: 'DEBUG must be off in production'
            },
            {
                type: 'assert',
                check: env => env.REGION !== undefined,
                message: 'REGION is required'
            }
        ];

        const errors = ConfigGuard.check(rules, { NODE_ENV: 'production', DEBUG: 'true' });

        assert.deepStrictEqual(errors, [
            'FATAL CONFIG: DEBUG must be off in production (Rule: NO_DEBUG_IN_PROD)',
            'FATAL CONFIG: REGION is required'
        ]);
    });

    it('should turn a throwing check into a violation', () => {
        const rules: GuardRule[] = [{
            type: 'assert',
            check: () => { throw new Error('boom'); },
            message: 'unreachable'
        }];

        assert.deepStrictEqual(ConfigGuard.check(rules, {}), ['Check failed for rule: boom']);
    });
});

describe('Database Configuration Guards', () => {
    it('should pass with a complete development environment', () => {
        assert.deepStrictEqual(ConfigGuard.check(DB_CONFIG_GUARDS, DB_ENV), []);
    });

    it('should require a CA certificate in production', () => {
        const errors = ConfigGuard.check(DB_CONFIG_GUARDS, { ...DB_ENV, NODE_ENV: 'production' });
        assert.deepStrictEqual(errors, ['FATAL CONFIG: DB_CA_CERT is required in production/staging']);
    });

    it('should reject a non-integer port', () => {
        const errors = ConfigGuard.check(DB_CONFIG_GUARDS, { ...DB_ENV, DB_PORT: 'fivefourthreetwo' });
        assert.deepStrictEqual(errors, ['FATAL CONFIG: DB_PORT must be an integer']);
    });

    it('createPool should refuse to build a pool from an incomplete environment', () => {
        assert.throws(
            () => createPool({ DB_HOST: 'localhost' }),
            (err: unknown) => {
                assert.ok(err instanceof GuardConfigError);
                assert.ok(err.issues.includes('FATAL CONFIG: Required env var DB_PASSWORD is missing'));
                return true;
            }
        );
    });
});
