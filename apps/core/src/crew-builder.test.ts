import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AutoApprovalGate } from "./approval.js";
import type { AgentRequest, AgentResponse, LlmBackend } from "./backend.js";
import { buildConfig, type CrewConfig, parseCliArgs } from "./config.js";
import { assembleCrew, buildSubstitutionValues, loadCrewPlan, loadPingTarget } from "./crew-builder.js";
import { BUNDLED_CREW_CONFIG } from "./crew-config.js";
import { CrewConfigError, PlaceholderMissingError } from "./errors.js";
import { Logger } from "./logger.js";

const CREW_YAML = `llm:
  model: gpt-4o
  temperature: 0.5
vars:
  target: src/solid
files:
  roots: ["{REPO_SHAPES_PATH}", out]
shell:
  allowedCommands: []
tasks:
  - agent: analyst
  - id: write
    agent: writer
    dependsOn: [analyst]
    llm:
      maxOutputTokens: 100
`;

const ANALYST_YAML = `role: Analyst
goal: Understand shapes
backstory: Reads SHACL.
task_description: Analyze {shape_name}
expected_output: Property list
tools: [read_file]
`;

const WRITER_YAML = `role: Writer
goal: Write classes
backstory: Writes TypeScript.
task_description: Write {shape_name} into {target} ({extra})
expected_output: Source code
output_file: out/{shape_name}.ts
tools: [write_file]
`;

const logger = new Logger(false, "builder-test", true, path.join(os.tmpdir(), "shacl-crew-tests"));

let repoRoot: string;
let config: CrewConfig;

beforeEach(async () => {
  repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), "builder-"));
  await fs.mkdir(path.join(repoRoot, "agents"));
  await fs.writeFile(path.join(repoRoot, "crew.config.yaml"), CREW_YAML);
  await fs.writeFile(path.join(repoRoot, "agents", "analyst.yaml"), ANALYST_YAML);
  await fs.writeFile(path.join(repoRoot, "agents", "writer.yaml"), WRITER_YAML);
  config = buildConfig(parseCliArgs(["run", "--shape", "Email", "--var", "extra=yes"]), {
    CREW_ROOT: repoRoot,
    REPO_SHAPES_PATH: "./shapes",
    MODEL_NAME_WRITER: "o1",
  });
});

afterEach(async () => {
  await fs.rm(repoRoot, { recursive: true, force: true });
});

describe("buildSubstitutionValues", () => {
  it("lets later sources win", () => {
    const values = buildSubstitutionValues(
      { ...config, vars: { target: "cli" } },
      { target: "crew", shape_name: "FromCrew", other: "x" },
    );
    expect(values).toEqual({
      REPO_SHAPES_PATH: "./shapes",
      REPO_OBJECT_PATH: "./blueprints",
      shape_name: "FromCrew",
      target: "cli",
      other: "x",
    });
  });

  it("omits shape_name without --shape", () => {
    expect(buildSubstitutionValues({ ...config, shapeName: undefined }, {})).not.toHaveProperty("shape_name");
  });
});

describe("loadCrewPlan", () => {
  it("resolves agents, roots and LLM settings", async () => {
    const plan = await loadCrewPlan(config, { bundledAgentsDir: null });

    expect(plan.crewSource).toBe(path.join(repoRoot, "crew.config.yaml"));
    expect(plan.process.kind).toBe("sequential");
    expect(plan.roots).toEqual(["./shapes", "out"]);
    expect(plan.tasks.map((t) => t.entry.id)).toEqual(["analyst", "write"]);
    expect(plan.tasks[0]?.llm).toEqual({
      model: "gpt-4o",
      apiKey: undefined,
      baseUrl: undefined,
      temperature: 0.5,
      maxOutputTokens: undefined,
    });
    expect(plan.tasks[1]?.llm).toMatchObject({ model: "o1", temperature: 0.5, maxOutputTokens: 100 });
    expect(plan.tasks[1]?.record.taskDescription).toBe("Write Email into src/solid (yes)");
    expect(plan.tasks[1]?.record.outputFile).toBe("out/Email.ts");
  });

  it("rejects process kinds that are not implemented", async () => {
    await fs.writeFile(path.join(repoRoot, "crew.config.yaml"), `process: parallel\n${CREW_YAML}`);
    const err = await loadCrewPlan(config, { bundledAgentsDir: null }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CrewConfigError);
    expect(err instanceof Error ? err.message : "").toBe(
      'Crew config error: process "parallel" is not supported yet; use "sequential"',
    );
  });
});

describe("assembleCrew", () => {
  it("runs the planned tasks end to end", async () => {
    const requests: AgentRequest[] = [];
    const backend: LlmBackend = {
      name: "fake",
      start: async () => {},
      stop: async () => {},
      respond: async (req): Promise<AgentResponse> => {
        requests.push(req);
        return { content: req.agentId === "analyst" ? "Email has 2 properties" : "export class Email {}" };
      },
    };

    const plan = await loadCrewPlan(config, { bundledAgentsDir: null });
    const crew = assembleCrew(plan, config, { backend, gate: new AutoApprovalGate(logger), logger });
    const result = await crew.kickoff();

    expect(result.status).toBe("completed");
    expect(requests[0]?.prompt).toBe("Analyze Email\n\nThis is the expected criteria for your final answer: Property list");
    expect(requests[0]?.tools.map((t) => t.id)).toEqual(["read_file"]);
    expect(requests[1]?.tools.map((t) => t.id)).toEqual(["write_file"]);
    expect(requests[1]?.llm.model).toBe("o1");
    expect(requests[1]?.prompt).toContain("## analyst\nEmail has 2 properties");
    expect(await fs.readFile(path.join(repoRoot, "out", "Email.ts"), "utf-8")).toBe("export class Email {}");
  });

  it("sandboxes file tools to the resolved roots", async () => {
    let output = "";
    const backend: LlmBackend = {
      name: "fake",
      start: async () => {},
      stop: async () => {},
      respond: async (req) => {
        const tool = req.tools.find((t) => t.id === "read_file");
        if (tool) output = await tool.invoke({ path: "crew.config.yaml" });
        return { content: "done" };
      },
    };

    const plan = await loadCrewPlan(config, { bundledAgentsDir: null });
    await assembleCrew(plan, config, { backend, gate: new AutoApprovalGate(logger), logger }).kickoff();

    expect(output).toBe("Error: Access denied - path outside allowed directories: crew.config.yaml");
  });
});

describe("loadPingTarget", () => {
  it("needs no shape name with the bundled crew", async () => {
    const emptyRepo = await fs.mkdtemp(path.join(os.tmpdir(), "ping-"));
    try {
      const pingConfig = buildConfig(parseCliArgs(["ping"]), { CREW_ROOT: emptyRepo });

      const target = loadPingTarget(pingConfig);

      expect(target.crewSource).toBe(BUNDLED_CREW_CONFIG);
      expect(target.llm).toEqual({
        model: "gpt-4o",
        apiKey: undefined,
        baseUrl: undefined,
        temperature: 1,
        maxOutputTokens: 8000,
      });
      await expect(loadCrewPlan(pingConfig)).rejects.toBeInstanceOf(PlaceholderMissingError);
    } finally {
      await fs.rm(emptyRepo, { recursive: true, force: true });
    }
  });

  it("uses the first task of the repository crew file", () => {
    const target = loadPingTarget(config);
    expect(target.crewSource).toBe(path.join(repoRoot, "crew.config.yaml"));
    expect(target.llm.model).toBe("gpt-4o");
    expect(target.llm.temperature).toBe(0.5);
  });
});
