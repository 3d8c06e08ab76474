/**
 * Tests for config.ts: environment and apps file.
 */

import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import {
  accountGroups,
  ConfigError,
  loadAppsConfig,
  loadConfig,
  parseAppsConfig,
} from "../src/config.js";
import { TEST_APPS_CONFIG } from "./setup.js";

const EXAMPLE_PATH = fileURLToPath(new URL("../config/apps.example.json", import.meta.url));

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected a ConfigError");
}

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ APPS_CONFIG_PATH: "/etc/potkeeper/apps.json" });

    expect(config).toMatchObject({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      LEDGER_PATH: "./data/transfers.jsonl",
      CREDENTIALS_DIR: "./credentials",
      POLL_INTERVAL_MS: 900000,
      TASK_DEADLINE_MS: 120000,
    });
    expect(config.API_KEY).toBeUndefined();
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ APPS_CONFIG_PATH: "apps.json", PORT: "8080", POLL_INTERVAL_MS: "60000" });

    expect(config.PORT).toBe(8080);
    expect(config.POLL_INTERVAL_MS).toBe(60000);
  });

  it("requires the apps file path", () => {
    const err = configError(() => loadConfig({}));

    expect(err.code).toBe("INVALID_ENV");
    expect(err.message).toContain("APPS_CONFIG_PATH");
  });

  it("rejects invalid values", () => {
    expect(configError(() => loadConfig({ APPS_CONFIG_PATH: "a.json", PORT: "abc" })).code).toBe("INVALID_ENV");
    expect(configError(() => loadConfig({ APPS_CONFIG_PATH: "a.json", LOG_LEVEL: "loud" })).code).toBe(
      "INVALID_ENV",
    );
  });
});

// =============================================================================
// parseAppsConfig
// =============================================================================

describe("parseAppsConfig", () => {
  it("fills in rule defaults", () => {
    const config = parseAppsConfig(TEST_APPS_CONFIG);

    expect(config.creditCardPot).toMatchObject({
      runAt: "21:00",
      minDeltaMinorUnits: 1,
      allowWithdrawals: false,
      minFundingRemainderMinorUnits: 5000,
    });
    expect(config.autoSaver).toMatchObject({ amountPerTriggerMinorUnits: 79, debounceMs: 60000 });
  });

  it("freezes the result", () => {
    const config = parseAppsConfig(TEST_APPS_CONFIG);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.banks[0]?.groups)).toBe(true);
  });

  it("rejects unknown banks", () => {
    const err = configError(() =>
      parseAppsConfig({ banks: [{ bankRef: "NATWEST", groups: { main: [{ kind: "account", id: "a" }] } }] }),
    );

    expect(err.code).toBe("INVALID_APPS_CONFIG");
    expect(err.message).toContain('Unknown bank "NATWEST"');
  });

  it("rejects empty groups", () => {
    const err = configError(() => parseAppsConfig({ banks: [{ bankRef: "HSBC", groups: { main: [] } }] }));

    expect(err.code).toBe("INVALID_APPS_CONFIG");
    expect(err.message).toContain("Account group has no members");
  });

  it("rejects a bank configured twice", () => {
    const bank = { bankRef: "HSBC", groups: { main: [{ kind: "account", id: "a" }] } };

    expect(configError(() => parseAppsConfig({ banks: [bank, bank] })).message).toBe(
      "Bank HSBC is configured twice",
    );
  });

  it("rejects rules that reference unconfigured groups", () => {
    const err = configError(() =>
      parseAppsConfig({
        ...TEST_APPS_CONFIG,
        creditCardPot: {
          ...TEST_APPS_CONFIG.creditCardPot,
          cardGroups: [{ bankRef: "HSBC", group: "credit_cards" }],
        },
      }),
    );

    expect(err.code).toBe("UNKNOWN_GROUP");
  });

  it("fills in savings sweep defaults", () => {
    const config = parseAppsConfig({
      ...TEST_APPS_CONFIG,
      savingsSweep: { potId: "pot_savings", fundingAccountId: "acc_current" },
    });

    expect(config.savingsSweep).toEqual({
      potId: "pot_savings",
      fundingAccountId: "acc_current",
      cards: [],
      roundUps: true,
      incomePercent: 0,
      flaggedPercent: 0,
      perLikedTrackMinorUnits: 79,
      minimumMinorUnits: 0,
      lookbackHours: 24,
    });
  });

  it("rejects an unreadable flagged spend pattern", () => {
    const err = configError(() =>
      parseAppsConfig({
        ...TEST_APPS_CONFIG,
        savingsSweep: { potId: "pot_savings", fundingAccountId: "acc_current", flaggedPattern: "(takeaway" },
      }),
    );

    expect(err.code).toBe("INVALID_APPS_CONFIG");
    expect(err.message).toBe("savingsSweep.flaggedPattern is not a valid pattern: (takeaway");
  });

  it("rejects a share above 100 percent", () => {
    const err = configError(() =>
      parseAppsConfig({
        ...TEST_APPS_CONFIG,
        savingsSweep: { potId: "pot_savings", fundingAccountId: "acc_current", incomePercent: 150 },
      }),
    );

    expect(err.code).toBe("INVALID_APPS_CONFIG");
  });

  it("rejects an unknown time zone", () => {
    const err = configError(() => parseAppsConfig({ ...TEST_APPS_CONFIG, timeZone: "Mars/Olympus" }));

    expect(err.message).toBe('Unknown time zone "Mars/Olympus"');
  });
});

// =============================================================================
// loadAppsConfig
// =============================================================================

describe("loadAppsConfig", () => {
  it("loads the example file", () => {
    const config = loadAppsConfig(EXAMPLE_PATH);

    expect(config.timeZone).toBe("Europe/London");
    expect(config.banks.map((b) => b.bankRef)).toEqual(["AMEX", "MONZO", "STARLING_JOINT"]);
    expect(config.creditCardPot?.cardGroups).toHaveLength(2);
    expect(config.savingsSweep).toMatchObject({ incomePercent: 2.5, runAt: "22:00" });
  });

  it("reports a missing file", () => {
    expect(configError(() => loadAppsConfig("/nonexistent/apps.json")).code).toBe("UNREADABLE_APPS_CONFIG");
  });
});

describe("accountGroups", () => {
  it("lists every group of every bank", () => {
    const groups = accountGroups(parseAppsConfig(TEST_APPS_CONFIG));

    expect(groups).toEqual([
      { bankRef: "AMEX", name: "credit_cards", members: [{ kind: "card", id: "amex_gold" }] },
      { bankRef: "MONZO", name: "current_account", members: [{ kind: "account", id: "acc_current" }] },
    ]);
  });
});
