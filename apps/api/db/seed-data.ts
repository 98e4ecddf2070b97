/**
 * Seed data for local runs: a handful of copies and members.
 * Read by the seed script (PostgreSQL) and by the in-memory store at startup.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const SeedDataSchema = z.object({
  copies: z.array(z.object({
    copyId: z.string().min(1).max(64),
    bookId: z.string().min(1).max(64),
  })),
  members: z.array(z.object({
    userId: z.string().min(1).max(64),
    active: z.boolean(),
    loanLimit: z.number().int().min(0),
  })),
});
export type SeedData = z.infer<typeof SeedDataSchema>;

export function loadSeedData(path = join(__dirname, 'seed-data.json')): SeedData {
  return SeedDataSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}
