// Core domain types for casegen

// Output formats accepted by --format
export const OUTPUT_FORMATS = ['json', 'text'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

// A single generation request, built once from the command line
export interface GenerationRequest {
  readonly feature: string;
  readonly model: string;
  readonly format: OutputFormat;
}

// Which interpretation path produced the test cases
export type ResultSource = 'json' | 'lines';

export interface GenerationResult {
  testCases: string[];
  source: ResultSource;
}

// Remote registry metadata shown before a download
export interface ModelInfo {
  name: string;
  size: number;
  parameterSize: string;
  family: string;
}

// Entry of the local model listing (GET /api/tags)
export interface LocalModel {
  name: string;
  model?: string;
  size?: number;
  modified_at?: string;
  details?: {
    family?: string;
    parameter_size?: string;
    quantization_level?: string;
  };
}

// One NDJSON line of the pull stream
export interface PullEvent {
  status?: string;
  digest?: string;
  total?: number;
  completed?: number;
  error?: string;
}

// Manager workflow stages
export type GeneratorStage =
  | 'idle'
  | 'checking'
  | 'present'
  | 'confirming'
  | 'declined'
  | 'downloading'
  | 'pulled'
  | 'failed'
  | 'generating'
  | 'rendered';

export type ModelAvailability =
  | { status: 'present' }
  | { status: 'pulled' }
  | { status: 'declined' };
