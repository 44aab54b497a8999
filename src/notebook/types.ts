import type { z } from 'zod';
import type {
  CellMetadataSchema,
  CellRunMetadataSchema,
  CellSchema,
  CellStatusSchema,
  CodeCellSchema,
  DisplayDataOutputSchema,
  ErrorOutputSchema,
  ExecuteResultOutputSchema,
  MarkdownCellSchema,
  NotebookMetadataSchema,
  NotebookSchema,
  OutputSchema,
  RawCellSchema,
  RunMetadataSchema,
  StreamOutputSchema,
} from './schema.js';

export type { ParameterValue, Parameters } from './schema.js';
export { FloatParameter, floatParameter, toPlainParameters } from './schema.js';

export type Notebook = z.output<typeof NotebookSchema>;
export type NotebookMetadata = z.output<typeof NotebookMetadataSchema>;
export type RunMetadata = z.output<typeof RunMetadataSchema>;

export type Cell = z.output<typeof CellSchema>;
export type CodeCell = z.output<typeof CodeCellSchema>;
export type MarkdownCell = z.output<typeof MarkdownCellSchema>;
export type RawCell = z.output<typeof RawCellSchema>;
export type CellType = Cell['cell_type'];
export type CellMetadata = z.output<typeof CellMetadataSchema>;
export type CellRunMetadata = z.output<typeof CellRunMetadataSchema>;
export type CellStatus = z.output<typeof CellStatusSchema>;

export type CellOutput = z.output<typeof OutputSchema>;
export type StreamOutput = z.output<typeof StreamOutputSchema>;
export type ErrorOutput = z.output<typeof ErrorOutputSchema>;
export type ExecuteResultOutput = z.output<typeof ExecuteResultOutputSchema>;
export type DisplayDataOutput = z.output<typeof DisplayDataOutputSchema>;
