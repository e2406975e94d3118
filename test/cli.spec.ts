import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { showRecipe } from "../src/cli";

const garlicRice = {
  id: "7",
  name: "Garlic Rice",
  ingredients: [
    { name: "Rice", quantity: "1.5 cups" },
    { name: "Garlic", quantity: "2", unit: "cloves" },
  ],
  servings: 2,
  detailed_instructions: "Rinse the rice twice. Cook the rice with garlic!",
  equipment_needed: "Saucepan",
};

type Captured = { stdout: string[]; stderr: string[] };

async function captureOutput(run: () => Promise<void>): Promise<Captured> {
  const captured: Captured = { stdout: [], stderr: [] };
  const originalLog = console.log;
  const originalError = console.error;
  console.log = (...args: unknown[]) => {
    captured.stdout.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]) => {
    captured.stderr.push(args.map(String).join(" "));
  };

  try {
    await run();
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
  return captured;
}

describe("cli show", () => {
  let tempDir: string;
  let originalExitCode: typeof process.exitCode;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "recipe-detail-cli-"));
    originalExitCode = process.exitCode;
  });

  afterEach(async () => {
    process.exitCode = originalExitCode;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeRecipe(payload: unknown, name = "recipe.json"): Promise<string> {
    const inputPath = path.join(tempDir, name);
    await fs.writeFile(inputPath, JSON.stringify(payload), "utf-8");
    return inputPath;
  }

  it("prints the scaled share text", async () => {
    const inputPath = await writeRecipe(garlicRice);

    const { stdout, stderr } = await captureOutput(() => showRecipe(inputPath, { scale: 2 }));

    assert.deepEqual(stdout, [
      [
        "Garlic Rice",
        "",
        "Serves 4",
        "",
        "Ingredients:",
        "- 3 cups Rice",
        "- 4 cloves Garlic",
        "",
        "Instructions:",
        "1. Rinse the rice twice.",
        "2. Cook the rice with garlic!",
      ].join("\n"),
    ]);
    assert.deepEqual(stderr, []);
  });

  it("prints the scaled view as JSON", async () => {
    const inputPath = await writeRecipe(garlicRice);

    const { stdout } = await captureOutput(() => showRecipe(inputPath, { scale: 0.5, json: true }));
    const view = JSON.parse(stdout[0]) as {
      servings: number;
      ingredients: Array<{ quantity: string }>;
      equipment_needed: string[];
    };

    assert.equal(view.servings, 1);
    assert.deepEqual(
      view.ingredients.map((ingredient) => ingredient.quantity),
      ["0.75 cups", "1"],
    );
    assert.deepEqual(view.equipment_needed, ["Saucepan"]);
  });

  it("prints assembly warnings to stderr", async () => {
    const inputPath = await writeRecipe({ ...garlicRice, cooking_tips: '{"tip": "Toast the rice first."}' });

    const { stderr } = await captureOutput(() => showRecipe(inputPath));

    assert.deepEqual(stderr, [
      "Warning: cooking_tips: JSON value is not a list, kept as a single tip",
    ]);
  });

  it("lists validation errors and sets a failing exit code", async () => {
    const inputPath = await writeRecipe({ id: "8", name: "No Ingredients", servings: 2 });

    const { stdout } = await captureOutput(() => showRecipe(inputPath));

    assert.deepEqual(stdout, ["Validation errors:", "- $ must have required property 'ingredients'"]);
    assert.equal(process.exitCode, 1);
  });

  it("rejects scale factors outside the supported range", async () => {
    const inputPath = await writeRecipe(garlicRice);

    await assert.rejects(showRecipe(inputPath, { scale: 12 }), /Invalid scale factor: 12/);
  });

  it("rejects files that are not JSON", async () => {
    const inputPath = path.join(tempDir, "broken.json");
    await fs.writeFile(inputPath, "{ not json", "utf-8");

    await assert.rejects(showRecipe(inputPath), /Could not parse recipe JSON in/);
  });
});
