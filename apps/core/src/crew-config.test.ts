import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { parse as parseYaml } from "yaml";
import { BUNDLED_CREW_CONFIG, loadCrewConfig, parseCrewConfig } from "./crew-config.js";
import { CrewConfigError } from "./errors.js";

const minimal = { tasks: [{ agent: "architect" }] };

describe("parseCrewConfig", () => {
  it("fills in defaults", () => {
    const config = parseCrewConfig(minimal);
    expect(config.process).toBe("sequential");
    expect(config.maxRevisions).toBe(5);
    expect(config.llm).toEqual({ model: "gpt-4o", temperature: undefined, maxOutputTokens: undefined });
    expect(config.vars).toEqual({});
    expect(config.files.roots).toEqual([]);
    expect(config.shell.allowedCommands).toEqual(["ls", "cat", "git", "npx", "deno", "tsc"]);
    expect(config.tasks).toEqual([
      { id: "architect", agent: "architect", dependsOn: [], humanApproval: false, llm: undefined },
    ]);
  });

  it("keeps an explicitly empty command list", () => {
    expect(parseCrewConfig({ ...minimal, shell: { allowedCommands: [] } }).shell.allowedCommands).toEqual([]);
  });

  it("stringifies scalar vars", () => {
    expect(parseCrewConfig({ ...minimal, vars: { retries: 3, strict: true, name: "x" } }).vars).toEqual({
      retries: "3",
      strict: "true",
      name: "x",
    });
  });

  it("rejects nested vars", () => {
    expect(() => parseCrewConfig({ ...minimal, vars: { nested: { a: 1 } } })).toThrow(
      'Variable "nested" must be a string, number or boolean',
    );
  });

  it("parses task overrides", () => {
    const config = parseCrewConfig({
      tasks: [
        { agent: "architect" },
        { id: "dev", agent: "developer", dependsOn: ["architect"], humanApproval: true, llm: { model: "o1", temperature: 0.2 } },
      ],
    });
    expect(config.tasks[1]).toEqual({
      id: "dev",
      agent: "developer",
      dependsOn: ["architect"],
      humanApproval: true,
      llm: { model: "o1", temperature: 0.2, maxOutputTokens: undefined },
    });
  });

  it.each([
    [{ process: "hierarchical", ...minimal }, 'Unknown process "hierarchical"'],
    [{ llm: { temperature: 3 }, ...minimal }, '"temperature" must be between 0 and 2'],
    [{ maxRevisions: 0, ...minimal }, '"maxRevisions" must be a positive integer'],
    [{ tasks: [] }, '"tasks" must be a non-empty array'],
    [{ tasks: [{ agent: "a" }, { agent: "a" }] }, 'Duplicate task id "a"'],
    [{ tasks: [{ agent: "a", dependsOn: ["a"] }] }, 'Task "a" depends on itself'],
    [{ tasks: [{ agent: "a", dependsOn: ["ghost"] }] }, 'Task "a" depends on unknown task "ghost"'],
    [{ tasks: [{ agent: "a", dependsOn: ["b"] }, { agent: "b" }] }, 'Task "a" depends on "b", which runs later'],
    [{ tasks: [{ id: "x" }] }, '"agent" must be a non-empty string in tasks[0]'],
  ])("rejects invalid config %#", (raw, message) => {
    expect(() => parseCrewConfig(raw)).toThrow(CrewConfigError);
    expect(() => parseCrewConfig(raw)).toThrow(message);
  });

  it("accepts the declared but unsupported process kinds at parse time", () => {
    expect(parseCrewConfig({ process: "parallel", ...minimal }).process).toBe("parallel");
  });
});

describe("loadCrewConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("prefers the repository file", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "crew-config-"));
    await fs.writeFile(path.join(dir, "crew.config.yaml"), "tasks:\n  - agent: solo\n");
    const loaded = loadCrewConfig(dir, "crew.config.yaml");
    expect(loaded.source).toBe(path.join(dir, "crew.config.yaml"));
    expect(loaded.config.tasks.map((t) => t.id)).toEqual(["solo"]);
  });

  it("falls back to the bundled crew", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "crew-config-"));
    const loaded = loadCrewConfig(dir, "crew.config.yaml");
    expect(loaded.source).toBe(BUNDLED_CREW_CONFIG);
    expect(loaded.config.tasks.map((t) => t.id)).toEqual(["architect", "developer", "qa"]);
  });

  it("reports YAML syntax errors", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "crew-config-"));
    await fs.writeFile(path.join(dir, "crew.config.yaml"), "tasks: [unclosed\n");
    expect(() => loadCrewConfig(dir ?? "", "crew.config.yaml")).toThrow("Failed to parse");
  });

  it("bundled crew is internally consistent", async () => {
    const raw: unknown = parseYaml(await fs.readFile(BUNDLED_CREW_CONFIG, "utf-8"));
    const config = parseCrewConfig(raw);
    expect(config.tasks.find((t) => t.id === "developer")?.humanApproval).toBe(true);
    expect(config.files.roots).toContain("{REPO_SHAPES_PATH}");
  });
});
