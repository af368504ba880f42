import type { PipelineStage, StageSummary } from "./pipeline.js";

export interface RunInput {
  inputFolder: string;
  outputFolder: string;
  filePaths?: string[];
  reclassify?: boolean;
  skipTextReading?: boolean;
}

export interface PipelineRunSummary {
  inputFolder: string;
  outputFolder: string;
  imageCount: number;
  forwardedCount: number;
  stages: StageSummary[];
  textReading: "completed" | "skipped" | "failed";
  aborted: boolean;
}

export type RunStatus = "queued" | "running" | "completed" | "failed";

export interface RunProgress {
  current: number;
  total: number;
  message: string;
}

export interface RunRecord {
  runId: string;
  status: RunStatus;
  inputFolder: string;
  outputFolder: string;
  reclassify: boolean;
  skipTextReading: boolean;
  stage: PipelineStage | null;
  progress: RunProgress | null;
  summary?: PipelineRunSummary;
  errorCode?: string;
  errorReason?: string;
  createdAt: string;
  updatedAt: string;
}
