import type { Artifact } from '../pipeline/pipeline.types';

export interface CoverageUpload {
  artifact: Artifact;
  token: string;
  /** Classification tags, e.g. ["unittests"]. */
  flags: string[];
  commit?: string;
  branch?: string;
  signal?: AbortSignal;
}

export interface CoverageUploadReceipt {
  reportUrl: string;
}

/** External reporting service that receives coverage reports. */
export interface CoverageSink {
  upload(request: CoverageUpload): Promise<CoverageUploadReceipt>;
}

export const COVERAGE_SINK = Symbol('COVERAGE_SINK');
