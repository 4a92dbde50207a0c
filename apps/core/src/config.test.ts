import { describe, expect, it } from "vitest";
import { buildConfig, loadConfig, modelEnvKey, parseCliArgs } from "./config.js";

const env = { CREW_ROOT: "/tmp/crew-root" };

describe("parseCliArgs", () => {
  it("defaults to the run command", () => {
    expect(parseCliArgs([])).toEqual({
      command: "run",
      help: false,
      version: false,
      verbose: false,
      resume: false,
      autoApprove: false,
      shapeName: undefined,
      vars: {},
    });
  });

  it("parses commands, flags and repeated vars", () => {
    const cli = parseCliArgs(["validate", "-s", "Email", "--var", "target=src/solid", "--var", "style=a=b", "-y", "-r", "-v"]);
    expect(cli.command).toBe("validate");
    expect(cli.shapeName).toBe("Email");
    expect(cli.vars).toEqual({ target: "src/solid", style: "a=b" });
    expect(cli.autoApprove).toBe(true);
    expect(cli.resume).toBe(true);
    expect(cli.verbose).toBe(true);
  });

  it("rejects unknown commands", () => {
    expect(() => parseCliArgs(["deploy"])).toThrow('Unknown command "deploy"');
  });

  it("rejects malformed vars", () => {
    expect(() => parseCliArgs(["--var", "novalue"])).toThrow('Invalid --var "novalue"');
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["--bogus"])).toThrow();
  });
});

describe("buildConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig([], env);
    expect(config.repoRoot).toBe("/tmp/crew-root");
    expect(config.shapesRepoPath).toBe("./blueprints");
    expect(config.objectRepoPath).toBe("./blueprints");
    expect(config.agentsDir).toBe("agents");
    expect(config.crewConfigFile).toBe("crew.config.yaml");
    expect(config.crewDir).toBe(".crew");
    expect(config.sessionTimeoutMs).toBe(1_800_000);
    expect(config.shellTimeoutMs).toBe(60_000);
    expect(config.maxRetries).toBe(2);
    expect(config.backend).toEqual({ provider: "copilot", apiKey: undefined, baseUrl: undefined });
    expect(config.modelOverrides).toEqual({});
  });

  it("reads the environment", () => {
    const config = loadConfig([], {
      ...env,
      REPO_SHAPES_PATH: "../shapes",
      LLM_PROVIDER: "inference",
      GITHUB_COPILOT_TOKEN: "test-secret",
      LLM_BASE_URL: "http://localhost:9999/v1",
      MODEL_NAME_ARCHITECT: "o1",
      SHELL_TIMEOUT_MS: "5000",
      SHAPE_NAME: "Phone",
      VERBOSE: "true",
    });
    expect(config.shapesRepoPath).toBe("../shapes");
    expect(config.backend).toEqual({ provider: "inference", apiKey: "test-secret", baseUrl: "http://localhost:9999/v1" });
    expect(config.modelOverrides).toEqual({ ARCHITECT: "o1" });
    expect(config.shellTimeoutMs).toBe(5_000);
    expect(config.shapeName).toBe("Phone");
    expect(config.verbose).toBe(true);
  });

  it("prefers LLM_API_KEY over GITHUB_COPILOT_TOKEN", () => {
    const config = loadConfig([], { ...env, LLM_API_KEY: "test-key", GITHUB_COPILOT_TOKEN: "test-secret" });
    expect(config.backend.apiKey).toBe("test-key");
  });

  it("lets CLI flags win over the environment", () => {
    const config = buildConfig(parseCliArgs(["--shape", "Email"]), { ...env, SHAPE_NAME: "Phone" });
    expect(config.shapeName).toBe("Email");
  });

  it.each([
    [{ LLM_PROVIDER: "openai" }, 'Invalid value for LLM_PROVIDER: "openai"'],
    [{ MAX_RETRIES: "0" }, 'Invalid value for MAX_RETRIES: "0". Must be a positive integer.'],
    [{ VERBOSE: "yes" }, 'Invalid value for VERBOSE: "yes". Must be "true" or "false".'],
  ])("rejects bad values %#", (extra, message) => {
    expect(() => loadConfig([], { ...env, ...extra })).toThrow(message);
  });
});

describe("modelEnvKey", () => {
  it("upper-cases and replaces separators", () => {
    expect(modelEnvKey("code-reviewer")).toBe("CODE_REVIEWER");
    expect(modelEnvKey("qa")).toBe("QA");
  });
});
