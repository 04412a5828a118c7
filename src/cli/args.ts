import { parseArgs } from 'node:util';
import { z } from 'zod';
import { WORLD_TYPES } from '../model/constants';
import type { WorldInputs, WorldType } from '../model/types';
import { defaults, makeInputs, type WorldDefaults } from '../state/params';

export const PROG = 'worldgen';

type NumericKey = {
  [K in keyof WorldDefaults]: WorldDefaults[K] extends number ? K : never;
}[keyof WorldDefaults];
type SwitchKey = {
  [K in keyof WorldDefaults]: WorldDefaults[K] extends boolean ? K : never;
}[keyof WorldDefaults];

// positive: > 0, nonNegative: >= 0, fraction: 0 <= x < 1
type Domain = 'positive' | 'nonNegative' | 'fraction';

interface NumberFlag {
  key: NumericKey;
  long: string;
  short?: string;
  metavar: string;
  help: string;
  domain: Domain;
}

interface SwitchFlag {
  key: SwitchKey;
  long: string;
  short?: string;
  help: string;
}

export const NUMBER_FLAGS: readonly NumberFlag[] = [
  { key: 'mass', long: 'mass', short: 'm', metavar: 'mass', help: 'Mass of primary in Earth masses', domain: 'positive' },
  { key: 'starMass', long: 'mass_star', short: 'M', metavar: 'mass', help: 'Mass of star in Sol masses', domain: 'positive' },
  { key: 'starDistance', long: 'distance_star', short: 'D', metavar: 'distance', help: 'Distance of star in AU', domain: 'positive' },
  { key: 'luminosity', long: 'luminosity', short: 'l', metavar: 'float', help: 'Luminosity of star in multiples of solar luminosity', domain: 'positive' },
  { key: 'satelliteMass', long: 'satellite_mass', short: 's', metavar: 'mass', help: 'Mass of satellite in Earth masses', domain: 'positive' },
  { key: 'satelliteDistance', long: 'distance_primary', short: 'd', metavar: 'distance km', help: 'Distance of satellite in km', domain: 'positive' },
  { key: 'age', long: 'age', short: 'a', metavar: 'float', help: 'Age of system in billions of years', domain: 'nonNegative' },
  { key: 'density', long: 'density', short: 'k', metavar: 'float', help: 'Density of world in earth densities', domain: 'positive' },
  { key: 'eccentricity', long: 'ecc', short: 'e', metavar: 'float', help: 'Eccentricity of orbit', domain: 'fraction' },
  { key: 'metallicity', long: 'metal', metavar: 'float', help: 'Metallicity of system, with Sol being 1', domain: 'positive' }
];

export const SWITCH_FLAGS: readonly SwitchFlag[] = [
  { key: 'outsideIceLine', long: 'outside_ice_line', short: 'o', help: 'Is outside formation ice line' },
  { key: 'grandTack', long: 'grand_tack', short: 'g', help: 'System has undergone Grand Tack event' },
  { key: 'rockySatellite', long: 'rocky_sat', short: 'r', help: 'World is rocky satellite of gas giant' },
  { key: 'oortCloud', long: 'oort_cloud', help: 'Planet in Oort cloud' },
  { key: 'greenhouse', long: 'green_house', help: 'Planet has experienced runaway greenhouse event' },
  { key: 'tidalHeating', long: 'tidal_heating', short: 't', help: 'Satellite is heated by orbital tides' }
];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'world'; inputs: WorldInputs; seed?: number };

function flagName(flag: { long: string; short?: string }): string {
  return flag.short ? `-${flag.short}/--${flag.long}` : `--${flag.long}`;
}

export function usage(): string {
  const options = [
    '[-h]',
    ...NUMBER_FLAGS.map((f) => `[${f.short ? `-${f.short}` : `--${f.long}`} ${f.metavar}]`),
    ...SWITCH_FLAGS.map((f) => `[${f.short ? `-${f.short}` : `--${f.long}`}]`),
    '[--seed int]'
  ];
  return `usage: ${PROG} ${options.join(' ')} name type`;
}

export function help(): string {
  const row = (left: string, text: string) => `  ${left.padEnd(32)}${text}`;
  const option = (f: { long: string; short?: string }, metavar = '') => {
    const suffix = metavar ? ` ${metavar}` : '';
    return f.short ? `-${f.short}${suffix}, --${f.long}${suffix}` : `--${f.long}${suffix}`;
  };

  return [
    usage(),
    '',
    'Create worlds.',
    '',
    'positional arguments:',
    row('name', 'The name of the world'),
    row('type', `The type of the world (${WORLD_TYPES.join(', ')})`),
    '',
    'options:',
    row('-h, --help', 'show this help message and exit'),
    ...NUMBER_FLAGS.map((f) => row(option(f, f.metavar), `${f.help} (default: ${defaults[f.key]})`)),
    ...SWITCH_FLAGS.map((f) => row(option(f), `${f.help} (default: False)`)),
    row('--seed int', 'Seed for the dice (default: random)')
  ].join('\n');
}

const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INT = /^[+-]?\d+$/;

// Raw token -> number, checked against the flag's domain. Messages quote the token as typed.
function floatArg(flag: NumberFlag) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined) return defaults[flag.key];

      const value = Number(raw.trim());
      if (!FLOAT.test(raw.trim()) || !Number.isFinite(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `argument ${flagName(flag)}: invalid float value: '${raw}'`,
          params: { stage: 'type' }
        });
        return z.NEVER;
      }

      const problem =
        flag.domain === 'positive'
          ? value <= 0 && 'should be a positive float'
          : value < 0
            ? 'should be zero or a positive float'
            : flag.domain === 'fraction' && value >= 1 && 'should be less than 1';
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${raw}" ${problem}` });
        return z.NEVER;
      }
      return value;
    });
}

const seedSchema = z
  .string()
  .optional()
  .refine((raw) => raw === undefined || INT.test(raw.trim()), (raw) => ({
    message: `argument --seed: invalid int value: '${raw ?? ''}'`
  }))
  .transform((raw) => (raw === undefined ? undefined : Number.parseInt(raw, 10)));

const typeSchema = z.enum(['lone', 'orbited', 'satellite'], {
  errorMap: (_issue, ctx) => ({
    message: `argument type: invalid choice: '${String(ctx.data)}' (choose from ${WORLD_TYPES.map((t) => `'${t}'`).join(', ')})`
  })
}) satisfies z.ZodType<WorldType>;

// Unparseable values are reported before out-of-range ones
function firstIssue(issues: readonly z.ZodIssue[]): string {
  const typeIssue = issues.find((issue) => issue.code === 'custom' && issue.params?.stage === 'type');
  return (typeIssue ?? issues[0]).message;
}

/**
 * argv (without node and the script) -> validated world inputs.
 * Throws UsageError for anything the calculator must never see.
 */
export function parseWorldArgs(argv: readonly string[]): ParsedArgs {
  const options: Record<string, { type: 'string' | 'boolean'; short?: string }> = {
    help: { type: 'boolean', short: 'h' },
    seed: { type: 'string' }
  };
  // parseArgs rejects an own `short` that is undefined
  for (const f of NUMBER_FLAGS) options[f.long] = f.short ? { type: 'string', short: f.short } : { type: 'string' };
  for (const f of SWITCH_FLAGS) options[f.long] = f.short ? { type: 'boolean', short: f.short } : { type: 'boolean' };

  // Non-strict so that "-m -3" reads -3 as the value; unknown options are caught from the tokens
  const { tokens } = parseArgs({
    args: [...argv],
    options,
    strict: false,
    allowPositionals: true,
    tokens: true
  });

  if (tokens.some((t) => t.kind === 'option' && t.name === 'help')) return { kind: 'help' };

  const raw: Record<string, string> = {};
  const switches = new Set<string>();
  const positionals: string[] = [];
  const unrecognized: string[] = [];

  for (const token of tokens) {
    if (token.kind === 'positional') {
      positionals.push(token.value);
      continue;
    }
    if (token.kind !== 'option') continue;

    const option = options[token.name];
    if (!option) {
      unrecognized.push(token.rawName);
    } else if (option.type === 'boolean') {
      if (token.value !== undefined) {
        throw new UsageError(`argument ${token.rawName}: ignored explicit argument '${token.value}'`);
      }
      switches.add(token.name);
    } else if (token.value === undefined) {
      const flag = NUMBER_FLAGS.find((f) => f.long === token.name);
      throw new UsageError(`argument ${flag ? flagName(flag) : token.rawName}: expected one argument`);
    } else if (token.inlineValue && !token.rawName.startsWith('--')) {
      // -m=-3 means -m with the value -3
      raw[token.name] = token.value.replace(/^=/, '');
    } else {
      raw[token.name] = token.value;
    }
  }

  unrecognized.push(...positionals.slice(2));
  if (unrecognized.length > 0) {
    throw new UsageError(`unrecognized arguments: ${unrecognized.join(' ')}`);
  }

  const [name, type] = positionals;
  if (name === undefined || type === undefined) {
    const missing = name === undefined ? 'name, type' : 'type';
    throw new UsageError(`the following arguments are required: ${missing}`);
  }
  if (name.trim() === '') throw new UsageError('argument name: must not be empty');

  const worldType = typeSchema.safeParse(type);
  if (!worldType.success) throw new UsageError(firstIssue(worldType.error.issues));

  const numbers: Partial<Pick<WorldDefaults, NumericKey>> = {};
  const issues: z.ZodIssue[] = [];
  for (const f of NUMBER_FLAGS) {
    const parsed = floatArg(f).safeParse(raw[f.long]);
    if (parsed.success) numbers[f.key] = parsed.data;
    else issues.push(...parsed.error.issues);
  }
  if (issues.length > 0) throw new UsageError(firstIssue(issues));

  const seed = seedSchema.safeParse(raw.seed);
  if (!seed.success) throw new UsageError(firstIssue(seed.error.issues));

  const flags: Partial<Pick<WorldDefaults, SwitchKey>> = {};
  for (const f of SWITCH_FLAGS) flags[f.key] = switches.has(f.long);

  return {
    kind: 'world',
    inputs: makeInputs(name, worldType.data, { ...numbers, ...flags }),
    seed: seed.data
  };
}
