export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * One detection returned by the label service. Confidence is 0-100 and the
 * geometry, when present, is expressed as fractions of the image size.
 */
export interface Label {
  name: string;
  confidence: number;
  geometry?: BoundingBox;
}

export interface TextReading {
  digit: string;
  flagged: boolean;
}

export const NEXT_STAGE = "next_stage";
export const UNKNOWN_DEVICE = "unknown_device";
export const UNKNOWN_MATERIAL = "unknown";

/**
 * Cached state of one image. `null` means the owning stage has not written the
 * field yet; an empty label array still counts as processed.
 */
export interface ImageRecord {
  imageName: string;
  locationLabels: Label[] | null;
  locationClass: string | null;
  materialLabels: Label[] | null;
  materialClass: string | null;
  textReading: TextReading | null;
}

export type ImageRecordUpdate = Partial<Omit<ImageRecord, "imageName">>;

export interface LabelService {
  detect(image: Buffer, modelArn: string, minConfidence: number): Promise<Label[]>;
}

/** Deployment status of a custom-label model version, e.g. `RUNNING`; `null` when unknown. */
export interface ModelStatusService {
  modelStatus(projectArn: string, modelArn: string): Promise<string | null>;
}

export interface VlmService {
  generate(modelId: string, prompt: string, image: Buffer): Promise<string>;
}

export interface ProgressObserver {
  onProgress(current: number, total: number, message: string): void;
}

export type PipelineStage = "location" | "material" | "text_reading" | "dispatch";

export interface StageFailure {
  imageId: string;
  code: string;
  message: string;
}

export interface StageSummary {
  stage: PipelineStage;
  total: number;
  processed: number;
  cached: number;
  skipped: number;
  failures: StageFailure[];
}

export interface StageRunOptions {
  observer?: ProgressObserver;
  signal?: AbortSignal;
  concurrency?: number;
  reclassify?: boolean;
}
