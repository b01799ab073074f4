/**
 * Capability Tables
 *
 * Per-model data mapping abstract operation names ("setFrequency") to SCPI
 * verbs, quantity kinds, ranges and enum tokens. Tables live as JSON files in
 * ./capabilities and are validated against the schema below when loaded.
 */

import { readFileSync, readdirSync } from 'fs';
import { z } from 'zod';
import { INSTRUMENT_FAMILIES, Ok, Err, tryResult, type Result } from '../../shared/types.js';
import { ArgumentError } from './errors.js';
import { isUnitOf } from './units.js';

const CAPABILITIES_DIR = new URL('./capabilities/', import.meta.url);

const QuantityKindSchema = z.enum(['frequency', 'power', 'voltage', 'current']);

const RangeSchema = z
  .object({
    min: z.number().optional(),
    max: z.number().optional(),
  })
  .refine(r => r.min === undefined || r.max === undefined || r.min <= r.max, {
    message: 'range min must not exceed max',
  });

// IDN fields are matched as case-insensitive regular expressions
const IdnPatternSchema = z
  .string()
  .refine(pattern => tryResult(() => new RegExp(pattern, 'i')).ok, {
    message: 'not a valid regular expression',
  });

// Reply shape for queries whose answer is not a bare number
const ReplyFieldSchema = z.object({
  field: z.number().int(),
  suffix: z.string().optional(),
});

const common = {
  verb: z.string().min(1),
  /** Commands written before the main one, e.g. selecting a reply format */
  setup: z.array(z.string().min(1)).default([]),
  /** Delay after setup commands before the main command, in ms */
  settleMs: z.number().int().nonnegative().default(0),
  description: z.string().optional(),
};

const queryCommon = {
  ...common,
  /** Parameter written after the '?', e.g. "RMS" in "C1:PAVA? RMS" */
  argument: z.string().optional(),
  /** Send the verb without a trailing '?' (register reads on non-SCPI controllers) */
  bare: z.boolean().default(false),
};

const numberFormatting = {
  decimals: z.number().int().min(0).max(20).optional(),
  separator: z.string().optional(),
};

const SetQuantitySchema = z.object({
  type: z.literal('set-quantity'),
  ...common,
  ...numberFormatting,
  quantity: QuantityKindSchema,
  /** Unit the instrument expects after the verb; defaults to the base unit */
  instrumentUnit: z.string().optional(),
  /** Accepted range in base units (Hz, dBm, V, A) */
  range: RangeSchema.optional(),
});

const GetQuantitySchema = z.object({
  type: z.literal('get-quantity'),
  ...queryCommon,
  quantity: QuantityKindSchema,
  instrumentUnit: z.string().optional(),
  reply: ReplyFieldSchema.optional(),
});

const SetNumberSchema = z.object({
  type: z.literal('set-number'),
  ...common,
  ...numberFormatting,
  integer: z.boolean().default(false),
  range: RangeSchema.optional(),
});

const GetNumberSchema = z.object({
  type: z.literal('get-number'),
  ...queryCommon,
  reply: ReplyFieldSchema.optional(),
});

const SetStateSchema = z.object({
  type: z.literal('set-state'),
  ...common,
  on: z.string().min(1).default('ON'),
  off: z.string().min(1).default('OFF'),
});

const GetStateSchema = z.object({
  type: z.literal('get-state'),
  ...queryCommon,
});

const SetEnumSchema = z.object({
  type: z.literal('set-enum'),
  ...common,
  tokens: z.array(z.string().min(1)).min(1),
});

const GetEnumSchema = z.object({
  type: z.literal('get-enum'),
  ...queryCommon,
  tokens: z.array(z.string().min(1)).min(1),
});

const CommandSchema = z.object({
  type: z.literal('command'),
  ...common,
});

const GetTextSchema = z.object({
  type: z.literal('get-text'),
  ...queryCommon,
});

// Blocking query such as *OPC? whose reply only signals completion
const WaitSchema = z.object({
  type: z.literal('wait'),
  ...queryCommon,
  timeoutMs: z.number().int().positive().optional(),
});

const ErrorQuerySchema = z.object({
  type: z.literal('error-query'),
  ...queryCommon,
});

export const OperationSchema = z.discriminatedUnion('type', [
  SetQuantitySchema,
  GetQuantitySchema,
  SetNumberSchema,
  GetNumberSchema,
  SetStateSchema,
  GetStateSchema,
  SetEnumSchema,
  GetEnumSchema,
  CommandSchema,
  GetTextSchema,
  WaitSchema,
  ErrorQuerySchema,
]);

const FramingSchema = z.object({
  port: z.number().int().min(1).max(65535).default(5025),
  writeTerminator: z.string().min(1).default('\n'),
  readTerminator: z.string().min(1).default('\n'),
  /** Prompt characters the controller prefixes to replies (Telnet consoles) */
  promptPrefix: z.string().optional(),
  /** Banner lines the instrument prints on connect, discarded before use */
  greetingLines: z.number().int().nonnegative().default(0),
});

export const CapabilityTableSchema = z.object({
  manufacturer: z.string().min(1),
  model: z.string().min(1),
  family: z.enum(INSTRUMENT_FAMILIES),
  /** Patterns matched against *IDN? fields; more specific tables score higher */
  idn: z
    .object({
      manufacturer: IdnPatternSchema.optional(),
      model: IdnPatternSchema.optional(),
      specificity: z.number().int().nonnegative().default(1),
    })
    .optional(),
  framing: FramingSchema.default({}),
  numberFormat: z.enum(['fixed', 'scientific']).default('fixed'),
  /** Include *IDN?, *RST, *CLS, *OPC? and SYST:ERR? */
  ieee488: z.boolean().default(true),
  operations: z.record(z.string().min(1), OperationSchema),
});

export type Operation = z.infer<typeof OperationSchema>;
export type OperationType = Operation['type'];
export type OperationOf<T extends OperationType> = Extract<Operation, { type: T }>;
export type CapabilityTable = z.infer<typeof CapabilityTableSchema>;
export type CapabilityTableInput = z.input<typeof CapabilityTableSchema>;

export const COMMON_OPERATIONS: Record<string, Operation> = {
  identify: { type: 'get-text', verb: '*IDN', setup: [], settleMs: 0, bare: false },
  reset: { type: 'command', verb: '*RST', setup: [], settleMs: 0 },
  clearStatus: { type: 'command', verb: '*CLS', setup: [], settleMs: 0 },
  waitForCompletion: { type: 'wait', verb: '*OPC', setup: [], settleMs: 0, bare: false },
  readError: { type: 'error-query', verb: 'SYST:ERR', setup: [], settleMs: 0, bare: false },
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate table data and merge in the IEEE 488.2 common operations.
 * Operations defined by the table take precedence over the common set.
 */
export function parseCapabilityTable(data: unknown): Result<CapabilityTable, ArgumentError> {
  const parsed = CapabilityTableSchema.safeParse(data);
  if (!parsed.success) {
    return Err(new ArgumentError(`Invalid capability table: ${describeIssues(parsed.error)}`));
  }

  const table = parsed.data;
  for (const [name, operation] of Object.entries(table.operations)) {
    if (
      (operation.type === 'set-quantity' || operation.type === 'get-quantity') &&
      operation.instrumentUnit !== undefined &&
      !isUnitOf(operation.instrumentUnit, operation.quantity)
    ) {
      return Err(new ArgumentError(
        `Invalid capability table: operations.${name}.instrumentUnit "${operation.instrumentUnit}" is not a ${operation.quantity} unit`
      ));
    }
  }

  if (table.ieee488) {
    table.operations = { ...COMMON_OPERATIONS, ...table.operations };
  }
  return Ok(table);
}

/** Load and validate a capability table from a JSON file. */
export function loadCapabilityTable(path: string | URL): Result<CapabilityTable, ArgumentError> {
  const data = tryResult((): unknown => JSON.parse(readFileSync(path, 'utf-8')));
  if (!data.ok) {
    return Err(new ArgumentError(`Cannot read capability table ${String(path)}: ${data.error.message}`));
  }
  return parseCapabilityTable(data.value);
}

/** Load every table bundled with the library. */
export function loadBuiltinTables(): Result<CapabilityTable[], ArgumentError> {
  const files = readdirSync(CAPABILITIES_DIR)
    .filter(name => name.endsWith('.json'))
    .sort();

  const tables: CapabilityTable[] = [];
  for (const file of files) {
    const table = loadCapabilityTable(new URL(file, CAPABILITIES_DIR));
    if (!table.ok) return table;
    tables.push(table.value);
  }
  return Ok(tables);
}
