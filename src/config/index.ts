/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const portSchema = z.coerce.number().int().min(1).max(65535);
const positiveIntSchema = z.coerce.number().int().positive();
const flagSchema = z
    .string()
    .nullable()
    .default(null)
    .transform((value) => value === '1' || value?.toLowerCase() === 'true');

// Configuration schema
const configSchema = z.object({
    // Required - Actor service
    apifyToken: z.string().min(1, 'Actor service token is required'),
    apifyBaseUrl: urlSchema.default('https://api.apify.com'),

    // Required - Storage
    databaseUrl: z.string().min(1, 'Database URL is required'),
    redisUrl: z.string().min(1, 'Redis URL is required'),

    // Twitter source (profile handles)
    twitterActorId: z.string().min(1).default('apidojo/tweet-scraper'),
    twitterSinceDays: positiveIntSchema.default(7),
    twitterMaxItems: positiveIntSchema.default(250),
    twitterExtraQuery: z.string().default('').transform((s) => s.trim()),
    twitterUseSearchTerms: flagSchema,

    // Facebook source (page URLs)
    facebookActorId: z.string().min(1).default('apify/facebook-posts-scraper'),
    facebookSinceDays: positiveIntSchema.default(1),
    facebookResultsLimit: positiveIntSchema.default(3),

    // Unset means the run is awaited until the actor's own timeout
    actorWaitTimeoutSecs: positiveIntSchema.nullable().default(null),

    // Optional - Text generation
    openaiApiKey: z.string().nullable().default(null),
    chatgptModel: z.string().min(1).default('gpt-4-turbo'),

    // Worker Configuration
    workerConcurrency: positiveIntSchema.default(2),
    sweepIntervalMinutes: positiveIntSchema.default(30),

    // Logging, Metrics & Admin
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    metricsPort: portSchema.default(3001),
    adminApiToken: z.string().nullable().default(null),
});

export type Config = z.infer<typeof configSchema>;

type ConfigKey = keyof z.input<typeof configSchema>;

/**
 * Environment variable backing each config field
 */
const ENV_VARS: Record<ConfigKey, string> = {
    apifyToken: 'APIFY_TOKEN',
    apifyBaseUrl: 'APIFY_BASE_URL',
    databaseUrl: 'DATABASE_URL',
    redisUrl: 'REDIS_URL',
    twitterActorId: 'APIFY_TWITTER_ACTOR',
    twitterSinceDays: 'APIFY_SINCE_DAYS',
    twitterMaxItems: 'APIFY_MAX_ITEMS',
    twitterExtraQuery: 'APIFY_EXTRA_QUERY',
    twitterUseSearchTerms: 'APIFY_USE_SEARCH_TERMS',
    facebookActorId: 'APIFY_FACEBOOK_ACTOR',
    facebookSinceDays: 'FACEBOOK_SINCE_DAYS',
    facebookResultsLimit: 'FACEBOOK_RESULTS_LIMIT',
    actorWaitTimeoutSecs: 'ACTOR_WAIT_TIMEOUT_SECS',
    openaiApiKey: 'OPENAI_API_KEY',
    chatgptModel: 'CHATGPT_MODEL',
    workerConcurrency: 'WORKER_CONCURRENCY',
    sweepIntervalMinutes: 'SWEEP_INTERVAL_MINUTES',
    logLevel: 'LOG_LEVEL',
    metricsPort: 'METRICS_PORT',
    adminApiToken: 'ADMIN_API_TOKEN',
};

// Fields where an empty string means "not set"
const NULLABLE_KEYS: ReadonlySet<string> = new Set<ConfigKey>([
    'actorWaitTimeoutSecs',
    'openaiApiKey',
    'adminApiToken',
    'twitterUseSearchTerms',
]);

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const raw: Record<string, unknown> = {};
    for (const [key, envVar] of Object.entries(ENV_VARS)) {
        const value = env[envVar];
        raw[key] = NULLABLE_KEYS.has(key) ? value || null : value;
    }
    return raw;
}

/**
 * Validate an environment into a Config
 * @throws ConfigurationError listing every missing or invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
    const result = configSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const key = String(issue.path[0]);
            const envVars: Record<string, string | undefined> = ENV_VARS;
            return `${envVars[key] ?? key}: ${issue.message}`;
        });
        throw new ConfigurationError('Invalid configuration', issues);
    }

    return result.data;
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    try {
        return parseConfig(process.env);
    } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;

        console.error('\nConfiguration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(error.issues.map((issue) => `  - ${issue}`).join('\n'));
        console.error('\nSee .env.example for required configuration.\n');

        process.exit(1);
    }
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        apifyBaseUrl: cfg.apifyBaseUrl,
        apifyToken: '[REDACTED]',
        databaseUrl: cfg.databaseUrl.replace(/\/\/.*@/, '//<redacted>@'),
        redisUrl: cfg.redisUrl.replace(/\/\/.*@/, '//<redacted>@'),
        twitterActorId: cfg.twitterActorId,
        twitterSinceDays: cfg.twitterSinceDays,
        twitterMaxItems: cfg.twitterMaxItems,
        twitterUseSearchTerms: cfg.twitterUseSearchTerms,
        facebookActorId: cfg.facebookActorId,
        facebookSinceDays: cfg.facebookSinceDays,
        facebookResultsLimit: cfg.facebookResultsLimit,
        actorWaitTimeoutSecs: cfg.actorWaitTimeoutSecs,
        openaiApiKey: cfg.openaiApiKey ? '[CONFIGURED]' : null,
        chatgptModel: cfg.chatgptModel,
        workerConcurrency: cfg.workerConcurrency,
        sweepIntervalMinutes: cfg.sweepIntervalMinutes,
        logLevel: cfg.logLevel,
        metricsPort: cfg.metricsPort,
        adminApiToken: cfg.adminApiToken ? '[CONFIGURED]' : null,
    };
}

// Export singleton config
export const config = loadConfig();
