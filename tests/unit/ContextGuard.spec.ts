import { describe, it } from 'node:test';
import assert from 'node:assert';
import { executeContextGuard } from '../../libs/guards/contextGuard.js';

describe('executeContextGuard', () => {
    it('should normalize a valid context', () => {
        const result = executeContextGuard({
            actorId: '  user-1 ',
            action: 'content.create',
            requiredPermissions: ['content.create', 'content.create'],
            payload: { title: 'Hello' }
        });

        assert.ok(result.valid);
        assert.strictEqual(result.context.actorId, 'user-1');
        assert.deepStrictEqual([...result.context.requiredPermissions], ['content.create']);
        assert.deepStrictEqual(result.context.payload, { title: 'Hello' });
    });

    it('should default requiredPermissions to an empty set', () => {
        const result = executeContextGuard({ actorId: 'user-1', action: 'content.read' });
        assert.ok(result.valid);
        assert.strictEqual(result.context.requiredPermissions.size, 0);
    });

    it('should accept a Set of permissions', () => {
        const result = executeContextGuard({
            actorId: 'user-1',
            action: 'content.delete',
            requiredPermissions: new Set(['content.delete'])
        });
        assert.ok(result.valid);
        assert.ok(result.context.requiredPermissions.has('content.delete'));
    });

    it('should report a blank actor', () => {
        const result = executeContextGuard({ actorId: '   ', action: 'content.create' });
        assert.deepStrictEqual(result, { valid: false, issues: ['actorId: actorId is required'] });
    });

    it('should report a malformed action name', () => {
        const result = executeContextGuard({ actorId: 'user-1', action: 'Content.Create' });
        assert.deepStrictEqual(result, { valid: false, issues: ['action: action must be a dotted lowercase name'] });
    });

    it('should report missing fields', () => {
        const result = executeContextGuard({});
        assert.deepStrictEqual(result, { valid: false, issues: ['actorId: Required', 'action: Required'] });
    });

    it('should reject a non-object context', () => {
        const result = executeContextGuard(null);
        assert.deepStrictEqual(result, { valid: false, issues: ['context: Expected object, received null'] });
    });
});
