import { z } from 'zod';
import rawTables from '../data/tables.json';

/*
Lookup tables for the dice steps. Each row applies to every value up to and
including `upTo`; anything past the last row takes the last row.
- rotationRate: 3d6 + tidal adjustment -> sidereal day range (hours)
- obliquity / extremeObliquity: axial tilt range (degrees)
- hydrographics: 3d6 - M number -> water cover range (%)
- lithosphere / stressedLithosphere: interior state by heat roll or tidal stress
*/

const range = z.tuple([z.number(), z.number()]);
const prevalence = z.enum(['trace', 'minimal', 'moderate', 'extensive', 'massive']);
const lithosphere = z.enum(['molten', 'soft', 'earlyPlate', 'maturePlate', 'ancientPlate', 'solid']);

const rangeRow = z.object({ upTo: z.number(), range });

const TablesSchema = z.object({
  rotationRate: z.array(rangeRow).nonempty(),
  obliquity: z.array(rangeRow).nonempty(),
  extremeObliquity: z.array(rangeRow).nonempty(),
  hydrographics: z.array(rangeRow.extend({ prevalence })).nonempty(),
  lithosphere: z.array(z.object({ upTo: z.number(), lithosphere })).nonempty(),
  stressedLithosphere: z.array(z.object({ upTo: z.number(), lithosphere })).nonempty()
});

export type Tables = z.infer<typeof TablesSchema>;
export type TableRow = { upTo: number };

export const TABLES: Tables = TablesSchema.parse(rawTables);

export function lookUp<Row extends TableRow>(table: readonly [Row, ...Row[]], value: number): Row {
  return table.find((row) => value <= row.upTo) ?? table[table.length - 1];
}
