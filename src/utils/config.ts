import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CardLinkConfig, type NamespaceConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const NamespaceSchema = z.object({
    base: z.string().url(),
    resource: z.string().url(),
    schema: z.string().url(),
    card: z.string().url(),
});

const ConfigSchema = z.object({
    input: z.string().min(1),
    catalog: z.string().min(1),
    out: z.string().min(1),
    threshold: z.number().min(0).max(1),
    namePredicates: z.array(z.string().url()).min(1),
    namespaces: NamespaceSchema,
    setLabelPrefix: z.string(),
    progressEvery: z.number().int().nonnegative(),
    catalogUrl: z.string().url().optional(),
    httpTimeout: z.number().int().positive(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    jsonLogs: z.boolean(),
});

const FileConfigSchema = ConfigSchema.partial().extend({
    namespaces: NamespaceSchema.partial().optional(),
});

/**
 * Config values that can be overridden from a file, the environment, or
 * CLI flags. Namespaces merge key by key.
 */
export type ConfigOverrides = Partial<Omit<CardLinkConfig, 'namespaces'>> & {
    namespaces?: Partial<NamespaceConfig>;
};

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Drop keys whose value is undefined so they do not mask lower layers.
 */
function definedOnly<T extends object>(values: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in values) {
        if (values[key] !== undefined) result[key] = values[key];
    }
    return result;
}

/**
 * Load configuration from cardlink.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('cardlink', {
        searchPlaces: ['cardlink.config.json'],
    });

    let result: CosmiconfigResult;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    if (!result || result.isEmpty) return null;

    const { filepath } = result;
    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(formatIssues(parsed.error).map((issue) => `${filepath} ${issue}`));
    }

    getLogger().debug({ path: filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const logLevel = process.env['CARDLINK_LOG_LEVEL'];
    if (logLevel) {
        const parsed = ConfigSchema.shape.logLevel.safeParse(logLevel);
        if (!parsed.success) throw new ConfigError([`CARDLINK_LOG_LEVEL: ${parsed.error.issues[0]?.message ?? 'invalid'}`]);
        env.logLevel = parsed.data;
    }

    const catalogUrl = process.env['CARDLINK_CATALOG_URL'];
    if (catalogUrl) env.catalogUrl = catalogUrl;

    return env;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file >
 * `options.defaults` (per-command defaults) > built-in defaults
 *
 * @throws ConfigError when the merged configuration is invalid
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides = {},
    options: { searchFrom?: string; defaults?: ConfigOverrides } = {}
): Promise<CardLinkConfig> {
    const envConfig = loadEnvVars();
    const fileConfig: ConfigOverrides = (await loadConfigFile(options.searchFrom)) ?? {};
    const flags = definedOnly(cliFlags);
    const defaults = definedOnly(options.defaults ?? {});

    const merged = {
        ...DEFAULT_CONFIG,
        ...defaults,
        ...definedOnly(fileConfig),
        ...envConfig,
        ...flags,
        namespaces: {
            ...DEFAULT_CONFIG.namespaces,
            ...definedOnly(defaults.namespaces ?? {}),
            ...definedOnly(fileConfig.namespaces ?? {}),
            ...definedOnly(flags.namespaces ?? {}),
        },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError(formatIssues(parsed.error));
    }

    return parsed.data;
}
