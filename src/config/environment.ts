import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = (fallback: boolean) =>
    z
        .enum(['true', 'false', '1', '0', 'yes', 'no'])
        .optional()
        .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1' || value === 'yes'));

const envSchema = z.object({
    NIFI_BASE_URL: z.string().url().default('https://localhost:8443/nifi-api'),
    NIFI_USERNAME: z.string().default('Admin'),
    NIFI_PASSWORD: z.string().default(''),
    NIFI_TLS_VERIFY: flag(false),

    REMEDIATION_AUTO_STOP: flag(true),
    REMEDIATION_AUTO_DELETE: flag(true),
    REMEDIATION_AUTO_PURGE: flag(true),
    REMEDIATION_STOP_SCOPE: z.enum(['component', 'parent-group', 'component-then-parent-group']).default('component'),
    REMEDIATION_MAX_ROUNDS: z.coerce.number().int().min(0).max(10).default(1),
    REMEDIATION_REVISION_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    REMEDIATION_STOP_WAIT_MS: z.coerce.number().int().min(0).default(15_000),
    REMEDIATION_STOP_POLL_INTERVAL_MS: z.coerce.number().int().min(1).default(1_000),

    JOB_POLL_INTERVAL_MS: z.coerce.number().int().min(1).default(500),
    JOB_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),

    TRAVERSAL_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(5),
    TRAVERSAL_MAX_DEPTH: z.coerce.number().int().min(0).default(3),
    TRAVERSAL_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),

    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

function loadConfig() {
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            console.error(`❌ Invalid setting ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exit(1);
    }
    const env = parsed.data;

    return {
        nifi: {
            baseUrl: env.NIFI_BASE_URL,
            username: env.NIFI_USERNAME,
            password: env.NIFI_PASSWORD,
            tlsVerify: env.NIFI_TLS_VERIFY,
        },
        remediation: {
            autoStop: env.REMEDIATION_AUTO_STOP,
            autoDelete: env.REMEDIATION_AUTO_DELETE,
            autoPurge: env.REMEDIATION_AUTO_PURGE,
            stopScope: env.REMEDIATION_STOP_SCOPE,
            maxRemediationRounds: env.REMEDIATION_MAX_ROUNDS,
            revisionAttempts: env.REMEDIATION_REVISION_ATTEMPTS,
            stopWaitMs: env.REMEDIATION_STOP_WAIT_MS,
            stopPollIntervalMs: env.REMEDIATION_STOP_POLL_INTERVAL_MS,
        },
        jobs: {
            pollIntervalMs: env.JOB_POLL_INTERVAL_MS,
            timeoutMs: env.JOB_TIMEOUT_MS,
        },
        traversal: {
            concurrency: env.TRAVERSAL_CONCURRENCY,
            maxDepth: env.TRAVERSAL_MAX_DEPTH,
            timeoutSeconds: env.TRAVERSAL_TIMEOUT_SECONDS,
        },
        logLevel: env.LOG_LEVEL,
    };
}

export const config = loadConfig();

export function validateConfig(): void {
    if (!config.nifi.password) {
        console.error('❌ NIFI_PASSWORD is not set in .env file');
        process.exit(1);
    }
}
