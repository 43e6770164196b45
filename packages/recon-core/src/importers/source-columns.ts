/**
 * Column layouts of every source extract, loaded from data/source-columns.json.
 * Each source lists its renames (raw header to working name), the working
 * columns it cannot be cleaned without, and the columns kept after cleaning.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const sourceLayoutSchema = z
  .object({
    renames: z.record(z.string().min(1)),
    required: z.array(z.string().min(1)),
    keep: z.array(z.string().min(1)),
  })
  .strict();

const sourceColumnsSchema = z
  .object({
    point: sourceLayoutSchema,
    analog: sourceLayoutSchema,
    control: sourceLayoutSchema,
    setpoint: sourceLayoutSchema,
    matchCompare: sourceLayoutSchema,
    inventory: sourceLayoutSchema,
    alarmCompare: sourceLayoutSchema,
    autoTests: sourceLayoutSchema,
    commissioning: sourceLayoutSchema,
  })
  .strict();

export type SourceLayout = z.infer<typeof sourceLayoutSchema>;
export type SourceColumns = z.infer<typeof sourceColumnsSchema>;
export type SourceKind = keyof SourceColumns;

const DATA_FILE = fileURLToPath(new URL('../../data/source-columns.json', import.meta.url));

let loaded: SourceColumns | undefined;

export function sourceLayout(kind: SourceKind): SourceLayout {
  if (!loaded) {
    loaded = sourceColumnsSchema.parse(JSON.parse(readFileSync(DATA_FILE, 'utf8')));
  }
  return loaded[kind];
}
