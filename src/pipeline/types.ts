/**
 * @fileOverview: Request, result and state types of the naming pipeline
 * @module: PipelineTypes
 */

import type { CollectionName } from '../retrieval/types';

export type PipelineState =
  | 'idle'
  | 'extracting'
  | 'searching'
  | 'fusing'
  | 'generating'
  | 'completed'
  | 'errored';

export type AnalysisMode = 'text-question' | 'file-analysis';

export interface UploadedFile {
  name: string;
  bytes: Uint8Array;
}

export interface PipelineRequest {
  text?: string;
  file?: UploadedFile;
}

export interface RunOptions {
  onStateChange?: (state: PipelineState) => void;
}

export interface ResultMetadata {
  query: string;
  keywords: string[];
  contexts: Record<CollectionName, string[]>;
  contextCount: number;
  fileName?: string;
  language?: string;
  /** Free text submitted alongside a file. */
  userText?: string;
}

export interface ResultRecord {
  readonly id: string;
  readonly createdAt: string;
  readonly label: string;
  readonly answer: string;
  readonly mode: AnalysisMode;
  readonly metadata: ResultMetadata;
}
