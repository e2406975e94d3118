#!/usr/bin/env node
import { promises as fs } from "fs";
import { Command, InvalidArgumentError } from "commander";
import {
  assembleRecipeDetail,
  buildShareText,
  isValidScaleFactor,
  MAX_SCALE_FACTOR,
  toScaledView,
  validateRecipePayload,
  withScale,
} from "./pipeline";

type ShowOptions = {
  scale?: number;
  json?: boolean;
};

async function readPayload(inputPath: string): Promise<unknown> {
  const raw = await fs.readFile(inputPath, "utf-8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse recipe JSON in ${inputPath}: ${reason}`);
  }
}

export async function showRecipe(inputPath: string, options: ShowOptions = {}): Promise<void> {
  const scale = options.scale ?? 1;
  if (!isValidScaleFactor(scale)) {
    throw new Error(`Invalid scale factor: ${scale}. Expected a number above 0 and at most ${MAX_SCALE_FACTOR}.`);
  }

  const payload = await readPayload(inputPath);
  const result = validateRecipePayload(payload);
  if (!result.ok) {
    console.log("Validation errors:");
    for (const error of result.errors) {
      console.log(`- ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  const detail = withScale(assembleRecipeDetail(payload), scale);
  for (const warning of detail.warnings) {
    console.error(`Warning: ${warning}`);
  }

  if (options.json) {
    console.log(JSON.stringify(toScaledView(detail), null, 2));
    return;
  }
  console.log(buildShareText(detail).trimEnd());
}

function parseScale(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

const program = new Command();

if (require.main === module) {
  program
    .name("recipe-detail")
    .description("Normalize, scale and render recipe payloads")
    .command("show")
    .argument("<inputPath>", "Path to a recipe JSON file")
    .option("--scale <factor>", "Scale factor for servings, ingredients and nutrition", parseScale)
    .option("--json", "Print the scaled view as JSON")
    .action(async (inputPath: string, options: ShowOptions) => {
      await showRecipe(inputPath, options);
    });

  program.parseAsync(process.argv).catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
