/**
 * @potkeeper/node: Configuration.
 *
 * Two sources, both validated with Zod:
 * - Environment variables (`loadConfig`): ports, paths, API endpoints,
 *   intervals
 * - The apps file (`loadAppsConfig`): banks and their account groups,
 *   the credit-card pot rule, the auto-saver, the savings sweep and
 *   notifications
 *
 * Both are loaded once at startup. The apps config is deep-frozen and
 * passed by reference; nothing mutates it afterwards.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { BANK_REFS, parseBankRef } from "@potkeeper/types";
import type { AccountGroup, BankRef } from "@potkeeper/types";

// =============================================================================
// Errors
// =============================================================================

export type ConfigErrorCode =
  | "INVALID_ENV"
  | "UNREADABLE_APPS_CONFIG"
  | "INVALID_APPS_CONFIG"
  | "UNKNOWN_GROUP";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

// =============================================================================
// Environment
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // When set, /api/* requires it in X-Api-Key
  API_KEY: z.string().min(1).optional(),

  // Files
  APPS_CONFIG_PATH: z.string().min(1),
  LEDGER_PATH: z.string().min(1).default("./data/transfers.jsonl"),
  CREDENTIALS_DIR: z.string().min(1).default("./credentials"),

  // External APIs
  HOME_ASSISTANT_URL: z.string().url().default("http://homeassistant.local:8123"),
  HOME_ASSISTANT_TOKEN: z.string().min(1).optional(),
  TRUELAYER_API_URL: z.string().url().default("https://api.truelayer.com"),
  MONZO_API_URL: z.string().url().default("https://api.monzo.com"),
  SPOTIFY_API_URL: z.string().url().default("https://api.spotify.com"),

  // Scheduling
  POLL_INTERVAL_MS: z.coerce.number().int().min(1000).default(900000),
  TASK_DEADLINE_MS: z.coerce.number().int().min(1000).default(120000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws ConfigError INVALID_ENV if required variables are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError("INVALID_ENV", `Invalid environment: ${describeIssues(result.error)}`);
  }
  return result.data;
}

// =============================================================================
// Apps File
// =============================================================================

const BankRefSchema = z.string().transform((value, ctx): BankRef => {
  const bankRef = parseBankRef(value);
  if (bankRef === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown bank "${value}". Expected one of: ${BANK_REFS.join(", ")}`,
    });
    return z.NEVER;
  }
  return bankRef;
});

const MemberSchema = z.object({
  kind: z.enum(["account", "card"]),
  id: z.string().min(1),
});

const GroupRefSchema = z.object({
  bankRef: BankRefSchema,
  group: z.string().min(1),
});

const HourSchema = z.number().int().min(0).max(23);
const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/);
const PercentSchema = z.number().min(0).max(100);
const MinorUnitsSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const AppsConfigSchema = z.object({
  /** IANA time zone for day stamps, daily runs and active hours */
  timeZone: z.string().min(1).default("UTC"),

  currency: z.string().length(3).default("GBP"),

  banks: z
    .array(
      z.object({
        bankRef: BankRefSchema,
        groups: z.record(
          z.string().min(1),
          z.array(MemberSchema).min(1, "Account group has no members"),
        ),
      }),
    )
    .min(1),

  /** Published entity ids are `sensor.<prefix>_<bank>_<group>` */
  entityPrefix: z.string().regex(/^[a-z0-9_]+$/).optional(),

  creditCardPot: z
    .object({
      /** Monzo pot id */
      potId: z.string().min(1),
      /** Monzo current account the pot is funded from */
      fundingAccountId: z.string().min(1),
      /** Groups whose combined balance is the amount owed on cards */
      cardGroups: z.array(GroupRefSchema).min(1),
      /** Group holding the funding account's balance */
      fundingGroup: GroupRefSchema,
      /** Local time of the daily run, "HH:MM" */
      runAt: TimeOfDaySchema.default("21:00"),
      minFundingRemainderMinorUnits: MinorUnitsSchema.default(0),
      /** Top-ups at or above this need confirmation */
      maxAutoTopUpMinorUnits: MinorUnitsSchema.default(10000),
      minDeltaMinorUnits: MinorUnitsSchema.default(1),
      allowWithdrawals: z.boolean().default(false),
    })
    .optional(),

  autoSaver: z
    .object({
      potId: z.string().min(1),
      fundingAccountId: z.string().min(1),
      amountPerTriggerMinorUnits: MinorUnitsSchema.min(1).default(79),
      debounceMs: z.number().int().min(1000).default(60000),
      activeHours: z.object({ startHour: HourSchema, endHour: HourSchema }).optional(),
    })
    .optional(),

  savingsSweep: z
    .object({
      potId: z.string().min(1),
      fundingAccountId: z.string().min(1),
      /** Monzo account whose transactions count. Default: fundingAccountId */
      transactionAccountId: z.string().min(1).optional(),
      /** Cards whose purchases count, read through TrueLayer */
      cards: z.array(z.object({ bankRef: BankRefSchema, cardId: z.string().min(1) })).default([]),
      roundUps: z.boolean().default(true),
      incomePercent: PercentSchema.default(0),
      /** Case-insensitive regular expression over transaction descriptions */
      flaggedPattern: z.string().min(1).optional(),
      flaggedPercent: PercentSchema.default(0),
      perLikedTrackMinorUnits: MinorUnitsSchema.default(79),
      minimumMinorUnits: MinorUnitsSchema.default(0),
      /** How far back the first sweep looks */
      lookbackHours: z.number().int().min(1).max(744).default(24),
      /** Local time of a daily sweep; without it sweeps run on request */
      runAt: TimeOfDaySchema.optional(),
    })
    .optional(),

  notifications: z
    .object({
      /** Home Assistant notify service, e.g. "mobile_app_phone" */
      notifyService: z.string().min(1),
    })
    .optional(),
});

export type AppsConfig = z.infer<typeof AppsConfigSchema>;
export type CreditCardPotConfig = NonNullable<AppsConfig["creditCardPot"]>;
export type AutoSaverAppConfig = NonNullable<AppsConfig["autoSaver"]>;
export type SavingsSweepAppConfig = NonNullable<AppsConfig["savingsSweep"]>;
export type GroupRef = z.infer<typeof GroupRefSchema>;

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenAppsConfig = DeepReadonly<AppsConfig>;
export type FrozenCreditCardPotConfig = DeepReadonly<CreditCardPotConfig>;
export type FrozenSavingsSweepConfig = DeepReadonly<SavingsSweepAppConfig>;

export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function assertGroupExists(config: AppsConfig, ref: GroupRef, where: string): void {
  const bank = config.banks.find((b) => b.bankRef === ref.bankRef);
  if (bank === undefined || !(ref.group in bank.groups)) {
    throw new ConfigError(
      "UNKNOWN_GROUP",
      `${where} references ${ref.bankRef}/${ref.group}, which is not a configured account group`,
    );
  }
}

/**
 * Validate a parsed apps file.
 *
 * @throws ConfigError INVALID_APPS_CONFIG for schema violations, unknown
 *         banks, empty groups and unreadable patterns
 * @throws ConfigError UNKNOWN_GROUP if a rule references a group that
 *         is not configured
 */
export function parseAppsConfig(raw: unknown): FrozenAppsConfig {
  const result = AppsConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("INVALID_APPS_CONFIG", `Invalid apps config: ${describeIssues(result.error)}`);
  }
  const config = result.data;

  const seen = new Set<BankRef>();
  for (const bank of config.banks) {
    if (seen.has(bank.bankRef)) {
      throw new ConfigError("INVALID_APPS_CONFIG", `Bank ${bank.bankRef} is configured twice`);
    }
    seen.add(bank.bankRef);
  }

  if (config.creditCardPot !== undefined) {
    for (const ref of config.creditCardPot.cardGroups) {
      assertGroupExists(config, ref, "creditCardPot.cardGroups");
    }
    assertGroupExists(config, config.creditCardPot.fundingGroup, "creditCardPot.fundingGroup");
  }

  const pattern = config.savingsSweep?.flaggedPattern;
  if (pattern !== undefined) {
    try {
      new RegExp(pattern, "i");
    } catch {
      throw new ConfigError("INVALID_APPS_CONFIG", `savingsSweep.flaggedPattern is not a valid pattern: ${pattern}`);
    }
  }

  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: config.timeZone });
  } catch {
    throw new ConfigError("INVALID_APPS_CONFIG", `Unknown time zone "${config.timeZone}"`);
  }

  return deepFreeze(config);
}

/**
 * Read and validate the apps file.
 *
 * @throws ConfigError UNREADABLE_APPS_CONFIG if the file cannot be read
 *         or is not JSON, otherwise as parseAppsConfig
 */
export function loadAppsConfig(path: string): FrozenAppsConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    throw new ConfigError(
      "UNREADABLE_APPS_CONFIG",
      `Cannot read apps config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseAppsConfig(raw);
}

/**
 * The account groups of every configured bank.
 */
export function accountGroups(config: FrozenAppsConfig): readonly AccountGroup[] {
  return config.banks.flatMap((bank) =>
    Object.entries(bank.groups).map(([name, members]) => ({
      bankRef: bank.bankRef,
      name,
      members,
    })),
  );
}
