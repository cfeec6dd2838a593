#!/usr/bin/env tsx

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { RosterInputError, generateRoster, parseRosterRequest } from "../src/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function main(): void {
  const requestPath = process.argv[2] ?? path.join(__dirname, "..", "fixtures", "sample-request.json");
  const raw: unknown = JSON.parse(fs.readFileSync(requestPath, "utf-8"));

  try {
    const request = parseRosterRequest(raw);
    const result = generateRoster(request, { logger: process.env.DEBUG ? console : undefined });
    console.log(JSON.stringify(result, null, 2));
    console.error(
      `${result.assignments.length} assignments, ${result.violations.length} violations (${result.period.start} to ${result.period.end})`,
    );
  } catch (error) {
    if (error instanceof RosterInputError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

main();
