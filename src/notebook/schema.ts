/**
 * @fileoverview Zod schemas for nbformat v4 notebook documents
 *
 * Only the fields paramnb reads or writes are modelled; every object is
 * `passthrough` so unknown keys survive a load/store round trip. Multi-line
 * `source` and stream `text` arrays are joined into one string on decode.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// PARAMETER VALUES
// ============================================================================

/**
 * A float whose value is integral (`1.0`, `1e3`). Integral numbers render as
 * integer literals, so these carry their floatness through to the translators.
 * Serializes as a plain number.
 */
export class FloatParameter {
  constructor(readonly value: number) {}

  toJSON(): number {
    return this.value;
  }

  toString(): string {
    const text = String(this.value);
    return /^-?\d+$/.test(text) ? `${text}.0` : text;
  }
}

/** Wraps `value` only when it would otherwise read as an integer. */
export function floatParameter(value: number): number | FloatParameter {
  return Number.isInteger(value) ? new FloatParameter(value) : value;
}

export type ParameterValue =
  | string
  | number
  | FloatParameter
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export type Parameters = Record<string, ParameterValue>;

export const ParameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.instanceof(FloatParameter),
    z.boolean(),
    z.null(),
    z.array(ParameterValueSchema),
    z.record(ParameterValueSchema),
  ])
);

export const ParametersSchema = z.record(ParameterValueSchema);

function toPlainValue(value: ParameterValue): ParameterValue {
  if (value instanceof FloatParameter) return value.value;
  if (Array.isArray(value)) return value.map(toPlainValue);
  if (value !== null && typeof value === 'object') return toPlainParameters(value);
  return value;
}

/** Deep copy holding only JSON values, for the run metadata. */
export function toPlainParameters(parameters: Parameters): Parameters {
  return Object.fromEntries(Object.entries(parameters).map(([name, value]) => [name, toPlainValue(value)]));
}

// ============================================================================
// OUTPUTS
// ============================================================================

const MultilineStringSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('') : value));

export const StreamOutputSchema = z.object({
  output_type: z.literal('stream'),
  name: z.enum(['stdout', 'stderr']),
  text: MultilineStringSchema,
}).passthrough();

export const ErrorOutputSchema = z.object({
  output_type: z.literal('error'),
  ename: z.string(),
  evalue: z.string(),
  traceback: z.array(z.string()),
}).passthrough();

export const ExecuteResultOutputSchema = z.object({
  output_type: z.literal('execute_result'),
  execution_count: z.number().int().nullable(),
  data: z.record(z.unknown()),
  metadata: z.record(z.unknown()).default({}),
}).passthrough();

export const DisplayDataOutputSchema = z.object({
  output_type: z.literal('display_data'),
  data: z.record(z.unknown()),
  metadata: z.record(z.unknown()).default({}),
}).passthrough();

export const OutputSchema = z.discriminatedUnion('output_type', [
  StreamOutputSchema,
  ErrorOutputSchema,
  ExecuteResultOutputSchema,
  DisplayDataOutputSchema,
]);

// ============================================================================
// METADATA
// ============================================================================

export const CellStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);

/** Per-cell `metadata.paramnb`, written by the execution manager. */
export const CellRunMetadataSchema = z.object({
  exception: z.boolean().nullable().optional(),
  start_time: z.string().nullable().optional(),
  end_time: z.string().nullable().optional(),
  duration: z.number().nullable().optional(),
  status: CellStatusSchema.optional(),
}).passthrough();

export const CellMetadataSchema = z.object({
  tags: z.array(z.string()).optional(),
  jupyter: z.object({
    source_hidden: z.boolean().optional(),
    outputs_hidden: z.boolean().optional(),
  }).passthrough().optional(),
  paramnb: CellRunMetadataSchema.optional(),
}).passthrough();

/** Document-level `metadata.paramnb`: what ran, with which parameters, and how it went. */
export const RunMetadataSchema = z.object({
  input_path: z.string().nullable().optional(),
  output_path: z.string().nullable().optional(),
  parameters: ParametersSchema.optional(),
  default_parameters: ParametersSchema.optional(),
  start_time: z.string().nullable().optional(),
  end_time: z.string().nullable().optional(),
  duration: z.number().nullable().optional(),
  exception: z.boolean().nullable().optional(),
  version: z.string().optional(),
}).passthrough();

export const NotebookMetadataSchema = z.object({
  kernelspec: z.object({
    name: z.string(),
    display_name: z.string().optional(),
    language: z.string().optional(),
  }).passthrough().optional(),
  language_info: z.object({
    name: z.string().optional(),
  }).passthrough().optional(),
  paramnb: RunMetadataSchema.optional(),
}).passthrough();

// ============================================================================
// CELLS
// ============================================================================

const cellBaseShape = {
  id: z.string().optional(),
  metadata: CellMetadataSchema.default({}),
  source: MultilineStringSchema,
};

export const CodeCellSchema = z.object({
  cell_type: z.literal('code'),
  ...cellBaseShape,
  execution_count: z.number().int().nullable().default(null),
  outputs: z.array(OutputSchema).default([]),
}).passthrough();

// Only code cells may carry outputs or an execution count.
export const MarkdownCellSchema = z.object({
  cell_type: z.literal('markdown'),
  ...cellBaseShape,
  attachments: z.record(z.unknown()).optional(),
  outputs: z.undefined(),
  execution_count: z.undefined(),
}).passthrough();

export const RawCellSchema = z.object({
  cell_type: z.literal('raw'),
  ...cellBaseShape,
  attachments: z.record(z.unknown()).optional(),
  outputs: z.undefined(),
  execution_count: z.undefined(),
}).passthrough();

export const CellSchema = z.discriminatedUnion('cell_type', [
  CodeCellSchema,
  MarkdownCellSchema,
  RawCellSchema,
]);

// ============================================================================
// NOTEBOOK
// ============================================================================

export const NotebookSchema = z.object({
  nbformat: z.literal(4),
  nbformat_minor: z.number().int().nonnegative(),
  metadata: NotebookMetadataSchema.default({}),
  cells: z.array(CellSchema),
}).passthrough();
