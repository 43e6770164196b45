/**
 * Zod schemas for validating stored tables
 */

import { z } from 'zod';

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** One row as stored in a JSON file */
export const rowSchema = z.record(cellValueSchema);

export const rowsSchema = z.array(rowSchema);

/** Column list stored beside the rows */
export const columnsSchema = z.array(z.string());
