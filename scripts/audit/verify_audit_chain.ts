import { PgAuditSink } from "../../libs/audit/PgAuditSink.js";
import { verifyAuditChain } from "../../libs/audit/integrity.js";
import { asPoolLike, createPool } from "../../libs/db/pool.js";

/**
 * Audit chain verification.
 * Walks audit_log in insertion order and recomputes every hash link.
 * Exits 1 on the first broken link.
 */
async function runChainVerification(): Promise<void> {
    console.log("--- STARTING AUDIT CHAIN VERIFICATION ---");

    const pool = createPool();
    try {
        const sink = new PgAuditSink(asPoolLike(pool));
        const records = await sink.loadChain();
        console.log(`Loaded ${records.length} audit records.`);

        const verification = verifyAuditChain(records);
        if (!verification.valid) {
            console.error(`FAILURE: ${verification.reason ?? "chain invalid"}`);
            process.exitCode = 1;
            return;
        }

        console.log("SUCCESS: Audit chain intact.");
    } finally {
        await pool.end();
    }

    console.log("--- AUDIT CHAIN VERIFICATION COMPLETE ---");
}

runChainVerification().catch((err: unknown) => {
    console.error("CRITICAL: Audit chain verification failed.");
    console.error(err);
    process.exit(1);
});
