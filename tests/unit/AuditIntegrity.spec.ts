import { describe, it } from 'node:test';
import assert from 'node:assert';
import { HashChainedAuditSink } from '../../libs/audit/HashChainedAuditSink.js';
import { canonicalJson, computeRecordHash, verifyAuditChain } from '../../libs/audit/integrity.js';
import { GENESIS_HASH } from '../../libs/audit/schema.js';
import type { AuditRecord, ChainedAuditRecord } from '../../libs/audit/schema.js';

function makeRecord(n: number): AuditRecord {
    return {
        id: `00000000-0000-4000-8000-00000000000${n}`,
        operationId: `op-${n}`,
        actorId: 'user-1',
        action: 'content.create',
        timestamp: `2026-01-01T00:00:0${n}.000Z`,
        outcome: 'success',
        severity: 'normal',
        detail: { n }
    };
}

async function buildChain(count: number): Promise<ChainedAuditRecord[]> {
    const stored: ChainedAuditRecord[] = [];
    const sink = new HashChainedAuditSink({ append: async record => { stored.push(record); } });
    for (let i = 1; i <= count; i++) {
        await sink.append(makeRecord(i));
    }
    return stored;
}

describe('canonicalJson', () => {
    it('should sort keys at every level', () => {
        assert.strictEqual(canonicalJson({ b: 1, a: { d: 2, c: [3, { z: 1, y: 2 }] } }), '{"a":{"c":[3,{"y":2,"z":1}],"d":2},"b":1}');
    });

    it('should make the hash independent of key order', () => {
        const record = makeRecord(1);
        const reordered: AuditRecord = {
            detail: record.detail,
            severity: record.severity,
            outcome: record.outcome,
            timestamp: record.timestamp,
            action: record.action,
            actorId: record.actorId,
            operationId: record.operationId,
            id: record.id
        };
        assert.strictEqual(computeRecordHash(record, GENESIS_HASH), computeRecordHash(reordered, GENESIS_HASH));
    });
});

describe('HashChainedAuditSink', () => {
    it('should link each record to its predecessor', async () => {
        const chain = await buildChain(3);

        assert.strictEqual(chain[0]?.integrity.prevHash, GENESIS_HASH);
        assert.strictEqual(chain[1]?.integrity.prevHash, chain[0]?.integrity.hash);
        assert.strictEqual(chain[2]?.integrity.prevHash, chain[1]?.integrity.hash);
        assert.strictEqual(chain[0]?.integrity.hash, computeRecordHash(makeRecord(1), GENESIS_HASH));
    });

    it('should serialize concurrent appends', async () => {
        const stored: ChainedAuditRecord[] = [];
        const sink = new HashChainedAuditSink({
            append: async record => {
                await new Promise(resolve => setImmediate(resolve));
                stored.push(record);
            }
        });

        await Promise.all([1, 2, 3].map(n => sink.append(makeRecord(n))));

        assert.deepStrictEqual(verifyAuditChain(stored), { valid: true });
        assert.strictEqual(sink.head, stored[2]?.integrity.hash);
    });

    it('should not advance the head when the inner sink fails', async () => {
        let fail = true;
        const stored: ChainedAuditRecord[] = [];
        const sink = new HashChainedAuditSink({
            append: async record => {
                if (fail) throw new Error('disk full');
                stored.push(record);
            }
        });

        await assert.rejects(sink.append(makeRecord(1)), /disk full/);
        assert.strictEqual(sink.head, GENESIS_HASH);

        fail = false;
        await sink.append(makeRecord(2));
        assert.strictEqual(stored[0]?.integrity.prevHash, GENESIS_HASH);
    });

    it('should refuse queries when the inner sink has none', async () => {
        const sink = new HashChainedAuditSink({ append: async () => undefined });
        await assert.rejects(sink.query(), /does not support queries/);
    });
});

describe('verifyAuditChain (Integrity)', () => {
    it('should verify a valid chain', async () => {
        assert.deepStrictEqual(verifyAuditChain(await buildChain(3)), { valid: true });
    });

    it('should accept an empty chain', () => {
        assert.deepStrictEqual(verifyAuditChain([]), { valid: true });
    });

    it('should detect tampered contents', async () => {
        const chain = await buildChain(3);
        const original = chain[1];
        assert.ok(original);
        chain[1] = { ...original, detail: { n: 99 } };

        const result = verifyAuditChain(chain);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.match(result.reason ?? '', /^Integrity violation at record 1: hash mismatch/);
    });

    it('should detect a removed record', async () => {
        const chain = await buildChain(3);
        chain.splice(1, 1);

        const result = verifyAuditChain(chain);

        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 1);
        assert.match(result.reason ?? '', /^Chain broken at record 1: prevHash mismatch/);
    });

    it('should verify from a custom genesis', async () => {
        const chain = await buildChain(1);
        const result = verifyAuditChain(chain, 'f'.repeat(64));
        assert.strictEqual(result.valid, false);
        assert.strictEqual(result.violationIndex, 0);
    });
});
