/**
 * Seed File Loading
 *
 * Reads an activity set from a YAML or JSON file (JSON is read by the YAML
 * parser). The file maps activity names to records in the wire format:
 *
 * ```yaml
 * Chess Club:
 *   description: Learn strategies and compete in chess tournaments
 *   schedule: Fridays, 3:30 PM - 5:00 PM
 *   max_participants: 12
 *   participants: [michael@mergington.edu]
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import * as yaml from 'yaml';
import { invalidSeed, NotFoundError, ErrorCode, parseActivityCatalog, type Activity } from '@mergington/core';

export function loadSeedFile(filePath: string): Activity[] {
  if (!existsSync(filePath)) {
    throw new NotFoundError(`Seed file not found: ${filePath}`, ErrorCode.NOT_FOUND, { value: filePath });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw invalidSeed(`cannot parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      filePath,
    });
  }

  return parseActivityCatalog(parsed);
}
