import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileExistsError, InvalidArgumentError, NotFoundError } from "../src/errors/tool-errors.js";
import { writeTestFile } from "../src/workspace/test-file.js";

const CONTENT = "class FooTest {\n  @Test void adds() {}\n}\n";

describe("writeTestFile", () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "covctl-write-"));
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  it("creates the file and its parent directories", async () => {
    const rel = "src/test/java/com/example/FooTest.java";

    const result = await writeTestFile(projectDir, rel, CONTENT);

    const target = path.join(projectDir, rel);
    expect(result).toEqual({ path: target, bytes: Buffer.byteLength(CONTENT), created: true });
    expect(fs.readFileSync(target, "utf8")).toBe(CONTENT);
  });

  it("refuses to replace an existing file by default", async () => {
    const target = path.join(projectDir, "FooTest.java");
    fs.writeFileSync(target, "original");

    await expect(writeTestFile(projectDir, "FooTest.java", CONTENT)).rejects.toBeInstanceOf(FileExistsError);
    expect(fs.readFileSync(target, "utf8")).toBe("original");
  });

  it("replaces an existing file with overwrite", async () => {
    const target = path.join(projectDir, "FooTest.java");
    fs.writeFileSync(target, "original");

    const result = await writeTestFile(projectDir, "FooTest.java", CONTENT, true);

    expect(result.created).toBe(false);
    expect(fs.readFileSync(target, "utf8")).toBe(CONTENT);
  });

  it("counts bytes, not characters", async () => {
    const result = await writeTestFile(projectDir, "Umlaut.java", "// grün\n");
    expect(result.bytes).toBe(9);
  });

  it.each(["../Escape.java", "/tmp/Escape.java", "src/../../Escape.java"])("refuses %s", async (rel) => {
    await expect(writeTestFile(projectDir, rel, CONTENT)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("fails with NotFoundError for a missing project", async () => {
    await expect(writeTestFile(path.join(projectDir, "missing"), "A.java", CONTENT)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
