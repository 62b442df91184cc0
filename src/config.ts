import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigValidationError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

type Env = Record<string, string | undefined>;

const optionalText = z.string().min(1).optional();

const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      debug: z.boolean(),
    }),
    zendesk: z.object({
      subdomain: z
        .string()
        .regex(/^[a-z0-9][a-z0-9-]*$/i, 'Subdomain must contain only letters, digits and dashes')
        .optional(),
      email: z.string().email('Invalid Zendesk email').optional(),
      apiToken: optionalText,
    }),
    database: z.object({
      file: z.string().min(1, 'Database file must not be empty'),
    }),
    jobQueue: z.object({
      maxConcurrentJobs: z.number().int().min(1).max(10),
    }),
    batch: z.object({
      itemDelayMs: z.number().int().min(0).max(60_000),
      rateLimitCooldownMs: z.number().int().min(0).max(600_000),
      syncItemCeiling: z.number().int().min(1),
      asyncItemCeiling: z.number().int().min(1).max(50_000),
    }),
    operator: z.object({
      id: z.string().min(1, 'Operator id must not be empty'),
      role: z.enum(['admin', 'user']),
    }),
  })
  .refine((config) => config.batch.syncItemCeiling <= config.batch.asyncItemCeiling, {
    message: 'Sync item ceiling must not exceed the async item ceiling',
    path: ['batch', 'syncItemCeiling'],
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --zendesk-subdomain acme --max-concurrent-jobs 2 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    const key = arg.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[key] = next;
      i++;
    } else {
      args[key] = true;
    }
  }

  return args;
}

/**
 * Build configuration from CLI flags, then environment, then defaults.
 * Throws ConfigValidationError listing every invalid setting.
 */
export function getConfig(argv: string[] = process.argv, env: Env = process.env): Config {
  const cliArgs = parseArgs(argv);

  const lookup = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string' && cliValue !== '') return cliValue;
    const envValue = env[envKey];
    return envValue !== undefined && envValue !== '' ? envValue : undefined;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string =>
    lookup(cliKey, envKey) ?? defaultValue;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] === true) return true;
    const value = lookup(cliKey, envKey);
    return value === 'true' ? true : value === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = lookup(cliKey, envKey);
    return value === undefined ? defaultValue : Number(value);
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'ticket-bulk-ops'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    zendesk: {
      subdomain: lookup('zendesk-subdomain', 'ZENDESK_SUBDOMAIN'),
      email: lookup('zendesk-email', 'ZENDESK_EMAIL'),
      apiToken: lookup('zendesk-token', 'ZENDESK_TOKEN'),
    },
    database: {
      file: getString('database-file', 'DATABASE_FILE', 'jobs.db'),
    },
    jobQueue: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 2),
    },
    batch: {
      itemDelayMs: getNumber('item-delay', 'BATCH_ITEM_DELAY_MS', 1000),
      rateLimitCooldownMs: getNumber('rate-limit-cooldown', 'RATE_LIMIT_COOLDOWN_MS', 60_000),
      syncItemCeiling: getNumber('sync-item-ceiling', 'SYNC_ITEM_CEILING', 500),
      asyncItemCeiling: getNumber('async-item-ceiling', 'ASYNC_ITEM_CEILING', 50_000),
    },
    operator: {
      id: getString('operator-id', 'OPERATOR_ID', 'operator'),
      role: getString('operator-role', 'OPERATOR_ROLE', 'user'),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return parsed.data;
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  const line = '═'.repeat(66);
  console.error(`╔${line}╗`);
  console.error('║' + '   Ticket Bulk Operations MCP Server - Configuration'.padEnd(66) + '║');
  console.error(`╚${line}╝`);

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);

  const { subdomain, email, apiToken } = config.zendesk;
  if (subdomain && email && apiToken) {
    console.error(`🔗 Zendesk: https://${subdomain}.zendesk.com as ${email}`);
  } else {
    console.error('⚠️  Zendesk: not configured (set ZENDESK_SUBDOMAIN, ZENDESK_EMAIL, ZENDESK_TOKEN)');
  }

  console.error(`💾 Database: ${config.database.file}`);
  console.error(
    `\n⚙️  Queue: ${config.jobQueue.maxConcurrentJobs} concurrent | Delay: ${config.batch.itemDelayMs}ms/item | Cooldown: ${config.batch.rateLimitCooldownMs}ms`
  );
  console.error(
    `📦 Limits: ${config.batch.syncItemCeiling} inline, ${config.batch.asyncItemCeiling} background`
  );
  console.error(`👤 Operator: ${config.operator.id} (${config.operator.role})`);

  console.error('\n' + '─'.repeat(68));
}
