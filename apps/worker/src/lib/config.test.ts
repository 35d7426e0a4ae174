import { describe, it, expect, afterEach, vi } from "vitest";
import path from "node:path";
import { formatFireTime, opsConfig, parseFireTime } from "./config.js";

describe("parseFireTime", () => {
  it("defaults to one minute past midnight", () => {
    expect(parseFireTime(undefined)).toEqual({ hour: 0, minute: 1 });
  });

  it("parses HH:MM and H:MM", () => {
    expect(parseFireTime("06:30")).toEqual({ hour: 6, minute: 30 });
    expect(parseFireTime("7:05")).toEqual({ hour: 7, minute: 5 });
    expect(parseFireTime(" 23:59 ")).toEqual({ hour: 23, minute: 59 });
  });

  it("rejects malformed or out-of-range values", () => {
    expect(() => parseFireTime("noon")).toThrow('DAILY_FIRE_TIME must look like HH:MM (got "noon")');
    expect(() => parseFireTime("24:00")).toThrow('DAILY_FIRE_TIME out of range (got "24:00")');
    expect(() => parseFireTime("12:60")).toThrow('DAILY_FIRE_TIME out of range (got "12:60")');
  });

  it("formats back to HH:MM", () => {
    expect(formatFireTime({ hour: 0, minute: 1 })).toBe("00:01");
  });
});

describe("opsConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads overrides from the environment", () => {
    vi.stubEnv("OPS_DB_PATH", ":memory:");
    vi.stubEnv("OPS_TIMEZONE", "Europe/Berlin");
    vi.stubEnv("DAILY_FIRE_TIME", "05:15");
    vi.stubEnv("RETENTION_DAYS", "30");
    vi.stubEnv("SCHEMA_TARGET_VERSION", "2");
    vi.stubEnv("EXPECTED_DATASET_CHECKSUM", " ABC123 ");

    expect(opsConfig()).toMatchObject({
      dbPath: ":memory:",
      timezone: "Europe/Berlin",
      fireTime: { hour: 5, minute: 15 },
      retentionDays: 30,
      schemaTargetVersion: 2,
      expectedDatasetChecksum: "abc123"
    });
  });

  it("falls back to defaults for missing or invalid numbers", () => {
    vi.stubEnv("OPS_DATASET_PATH", "");
    vi.stubEnv("OPS_TIMEZONE", "");
    vi.stubEnv("DAILY_FIRE_TIME", "");
    vi.stubEnv("RETENTION_DAYS", "-5");
    vi.stubEnv("SCHEMA_TARGET_VERSION", "1.5");
    vi.stubEnv("EXPECTED_DATASET_CHECKSUM", "");

    const config = opsConfig();
    expect(config.datasetPath).toBe(path.resolve(process.cwd(), "./data/operational-dataset.json"));
    expect(config.timezone).toBe("America/New_York");
    expect(config.fireTime).toEqual({ hour: 0, minute: 1 });
    expect(config.retentionDays).toBe(90);
    expect(config.schemaTargetVersion).toBe(1);
    expect(config.expectedDatasetChecksum).toBeUndefined();
  });

  it("rejects an unknown time zone", () => {
    vi.stubEnv("OPS_TIMEZONE", "Mars/Olympus_Mons");
    expect(() => opsConfig()).toThrow('Unknown time zone "Mars/Olympus_Mons"');
  });
});
