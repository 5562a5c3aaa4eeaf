import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath, getStateDir, getTriggersDir } from "../../src/config/paths.js";
import { parseConfig } from "../../src/config/schema.js";
import { ValidationError, toQueryError } from "../../src/utils/errors.js";
import { makeTempDir, removeDir } from "../helpers/fixtures.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "my-secret-token";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("token: ${env:TEST_TOKEN}")).toBe("token: my-secret-token");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TOKEN}:${env:TEST_PORT}")).toBe("my-secret-token:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow("Missing environment variable: MISSING_VAR");
  });

  it("leaves text without env vars unchanged", () => {
    expect(substituteEnv("no substitution here")).toBe("no substitution here");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("parses minimal config with defaults", () => {
    const config = parseConfig({});
    expect(config.mailbox.owner).toBe("");
    expect(config.query.port).toBe(19877);
    expect(config.query.enabled).toBe(false);
    expect(config.memory.schedule).toBe("*/5 * * * *");
    expect(config.organizer.maxClaims).toBe(5);
    expect(config.organizer.urgentAt).toBe("immediate");
    expect(config.triggers.capability).toBe("steward");
    expect(config.search.chunkSize).toBe(1500);
    expect(config.digest.day).toBe("friday");
    expect(config.classifier.command).toBeUndefined();
  });

  it("parses overrides", () => {
    const config = parseConfig({
      mailbox: { owner: "owner@example.com" },
      organizer: { batchSize: 5, urgentAt: "today" },
      classifier: { command: "classify", args: ["--json"] },
    });
    expect(config.mailbox.owner).toBe("owner@example.com");
    expect(config.organizer.batchSize).toBe(5);
    expect(config.organizer.urgentAt).toBe("today");
    expect(config.classifier.args).toEqual(["--json"]);
    expect(config.classifier.timeoutMs).toBe(60_000);
  });

  it("rejects an unknown urgency threshold", () => {
    expect(() => parseConfig({ organizer: { urgentAt: "eventually" } })).toThrow();
  });

  it("rejects a malformed digest time", () => {
    expect(() => parseConfig({ digest: { time: "25:00" } })).toThrow();
  });

  it("rejects an overlap at least as large as the chunk", () => {
    expect(() => parseConfig({ search: { chunkSize: 200, chunkOverlap: 200 } })).toThrow(
      "chunkOverlap must be smaller than chunkSize",
    );
  });

  it("fills in the default meeting prep rules", () => {
    const { meetings } = parseConfig({ meetings: { enabled: true } });
    expect(meetings.rules.map((r) => [r.name, r.prepMinutesBefore])).toEqual([
      ["external_meetings", 15],
      ["large_meetings", 30],
      ["important_keywords", 30],
    ]);
    expect(meetings.rules[1]).toMatchObject({ externalOnly: false, minAttendees: 5, keywords: [] });
  });

  it("rejects a working day that ends before it starts", () => {
    expect(() => parseConfig({ meetings: { workdayStart: "18:00", workdayEnd: "09:00" } })).toThrow(
      "workdayEnd must be later than workdayStart",
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    process.env["TEST_OWNER"] = "boss@example.com";
  });

  afterEach(() => {
    removeDir(dir);
    delete process.env["TEST_OWNER"];
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(dir, "absent.json"));
    expect(config.query.port).toBe(19877);
  });

  it("reads the file and substitutes env vars", () => {
    const path = join(dir, "steward.config.json");
    writeFileSync(path, JSON.stringify({ mailbox: { owner: "${env:TEST_OWNER}" }, followups: { days: 4 } }));
    const config = loadConfig(path);
    expect(config.mailbox.owner).toBe("boss@example.com");
    expect(config.followups.days).toBe(4);
  });

  it("rejects invalid JSON as invalid input", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(ValidationError);
    expect(() => loadConfig(path)).toThrow(`${path} is not valid JSON: `);
  });

  it("names the file and field of a schema violation", () => {
    const path = join(dir, "steward.config.json");
    writeFileSync(path, JSON.stringify({ followups: { days: -1 } }));
    expect(() => loadConfig(path)).toThrow(
      `Invalid config ${path}: followups.days: Number must be greater than or equal to 0`,
    );
  });

  it("classes a missing environment variable as invalid", () => {
    const path = join(dir, "steward.config.json");
    writeFileSync(path, JSON.stringify({ mailbox: { owner: "${env:STEWARD_TEST_UNSET}" } }));
    let caught: unknown;
    try {
      loadConfig(path);
    } catch (err) {
      caught = err;
    }
    expect(toQueryError(caught)).toEqual({
      kind: "invalid",
      message: "Missing environment variable: STEWARD_TEST_UNSET (referenced as ${env:STEWARD_TEST_UNSET})",
    });
  });
});

describe("paths", () => {
  afterEach(() => {
    delete process.env["STEWARD_STATE_DIR"];
    delete process.env["STEWARD_CONFIG_PATH"];
  });

  it("honours environment overrides", () => {
    process.env["STEWARD_STATE_DIR"] = "/tmp/steward-state";
    process.env["STEWARD_CONFIG_PATH"] = "/tmp/steward.json";
    expect(getStateDir()).toBe("/tmp/steward-state");
    expect(getConfigPath()).toBe("/tmp/steward.json");
  });

  it("places triggers under the state dir unless configured", () => {
    expect(getTriggersDir(parseConfig({}), "/state")).toBe(join("/state", "triggers"));
    expect(getTriggersDir(parseConfig({ triggers: { dir: "/queue" } }), "/state")).toBe("/queue");
  });
});
