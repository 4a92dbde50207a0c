import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CrewConfigError } from "./errors.js";
import { optionalPositiveInt, optionalString, optionalStringArray, preview, requireString, writeFileAtomic } from "./utils.js";

describe("validation helpers", () => {
  it("requireString returns the value", () => {
    expect(requireString({ role: "Architect" }, "role", "agent")).toBe("Architect");
  });

  it("requireString rejects blank strings", () => {
    expect(() => requireString({ role: "  " }, "role", "agent x")).toThrow(
      'Crew config error: "role" must be a non-empty string in agent x',
    );
  });

  it("requireString throws CrewConfigError for missing keys", () => {
    expect(() => requireString({}, "goal", "agent x")).toThrow(CrewConfigError);
  });

  it("optionalString treats empty strings as absent", () => {
    expect(optionalString({ output_file: "" }, "output_file", "agent")).toBeUndefined();
    expect(optionalString({}, "output_file", "agent")).toBeUndefined();
    expect(optionalString({ output_file: "out.md" }, "output_file", "agent")).toBe("out.md");
  });

  it("optionalPositiveInt rejects fractions and zero", () => {
    expect(optionalPositiveInt({ n: 3 }, "n", "cfg")).toBe(3);
    expect(() => optionalPositiveInt({ n: 1.5 }, "n", "cfg")).toThrow("positive integer");
    expect(() => optionalPositiveInt({ n: 0 }, "n", "cfg")).toThrow("positive integer");
  });

  it("optionalStringArray defaults to an empty list", () => {
    expect(optionalStringArray({}, "tools", "agent")).toEqual([]);
    expect(optionalStringArray({ tools: ["read_file"] }, "tools", "agent")).toEqual(["read_file"]);
    expect(() => optionalStringArray({ tools: "read_file" }, "tools", "agent")).toThrow("array of non-empty strings");
  });
});

describe("preview", () => {
  it("keeps only the first line", () => {
    expect(preview("first line\nsecond line")).toBe("first line");
  });

  it("truncates long lines", () => {
    expect(preview("abcdefghij", 4)).toBe("abcd…");
  });
});

describe("writeFileAtomic", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs) await fs.rm(dir, { recursive: true, force: true });
    dirs.length = 0;
  });

  it("creates parent directories and leaves no temp files behind", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "atomic-"));
    dirs.push(dir);
    const target = path.join(dir, "nested", "out.md");

    await writeFileAtomic(target, "first");
    await writeFileAtomic(target, "second");

    expect(await fs.readFile(target, "utf-8")).toBe("second");
    expect(await fs.readdir(path.join(dir, "nested"))).toEqual(["out.md"]);
  });
});
