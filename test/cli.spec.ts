import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { buildProgram, ingestCommand, listCommand, showCommand } from "../src/cli";

const dinner = [
  "Recipe: Banana Bread",
  "- 2 cups flour",
  "- 3 large eggs",
  "Instructions",
  "Mash the bananas well.",
  "Bake for one hour.",
  "Nutrition: Calories 210",
  "---",
  "Recipe: Herb Rice",
  "1 cup rice",
  "Directions",
  "Simmer the rice gently.",
].join("\n");

async function captureStdout(run: () => Promise<void>): Promise<string[]> {
  const messages: string[] = [];
  const originalLog = console.log;
  console.log = (...args: unknown[]) => {
    messages.push(args.map(String).join(" "));
  };
  try {
    await run();
  } finally {
    console.log = originalLog;
  }
  return messages;
}

describe("cli", () => {
  let tempDir: string;
  let storeDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "recipe-ingest-cli-"));
    storeDir = path.join(tempDir, "store");
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("ingests a text file, then lists and shows the stored recipes", async () => {
    const inputPath = path.join(tempDir, "dinner.txt");
    await fs.writeFile(inputPath, dinner, "utf-8");

    const ingestOutput = await captureStdout(() => ingestCommand(inputPath, { store: storeDir }));
    const listOutput = await captureStdout(() => listCommand({ store: storeDir }));
    const showOutput = await captureStdout(() => showCommand("1", { store: storeDir }));

    assert.equal(ingestOutput[1], "Ingested 2 recipe(s) from dinner.txt.");
    assert.deepEqual(listOutput, ["1. Banana Bread\n2. Herb Rice"]);
    assert.deepEqual(showOutput, [
      [
        "Banana Bread",
        "Ingredients:",
        "- - 2 cups flour",
        "- - 3 large eggs",
        "Instructions:",
        "1. Mash the bananas well.",
        "2. Bake for one hour.",
        "Macros:",
        "Calories: 210",
      ].join("\n"),
    ]);
    assert.equal(process.exitCode, undefined);
  });

  it("accepts literal text and prints a skip summary when nothing is stored", async () => {
    const output = await captureStdout(() => ingestCommand(undefined, { text: "too short", store: storeDir }));

    assert.deepEqual(output.slice(-2), ["Skip summary:", "- block shorter than 20 characters: 1"]);
    assert.equal(process.exitCode, 1);
  });

  it("requires exactly one of a source or --text", async () => {
    await assert.rejects(ingestCommand(undefined, { store: storeDir }), {
      message: "Provide a source path/URL or --text.",
    });
    await assert.rejects(ingestCommand("dinner.txt", { text: "x", store: storeDir }), {
      message: "Provide either a source path/URL or --text, but not both.",
    });
  });

  it("rejects ids that are not positive integers or not stored", async () => {
    await assert.rejects(showCommand("abc", { store: storeDir }), {
      message: 'Expected a positive integer, got "abc".',
    });
    await assert.rejects(showCommand("3", { store: storeDir }), {
      message: `No recipe with id 3 in ${storeDir}`,
    });
  });

  it("parses subcommands and store options", async () => {
    const output = await captureStdout(async () => {
      await buildProgram().parseAsync(["node", "recipe-ingest", "list", "--store", storeDir]);
    });

    assert.deepEqual(output, ["No recipes stored."]);
  });
});
