import {
  type CustomLabel,
  DescribeProjectVersionsCommand,
  DetectCustomLabelsCommand,
  RekognitionClient
} from "@aws-sdk/client-rekognition";
import type { Label, LabelService, ModelStatusService } from "../../types/pipeline.js";
import { PipelineError } from "../pipelineError.js";

/** Maps one Rekognition custom label onto the pipeline's label shape. */
export function toLabel(customLabel: CustomLabel): Label | null {
  if (!customLabel.Name) return null;
  const label: Label = { name: customLabel.Name, confidence: customLabel.Confidence ?? 0 };
  const box = customLabel.Geometry?.BoundingBox;
  if (box) {
    label.geometry = {
      left: box.Left ?? 0,
      top: box.Top ?? 0,
      width: box.Width ?? 0,
      height: box.Height ?? 0
    };
  }
  return label;
}

/** `arn:aws:rekognition:<region>:<account>:project/<project>/version/<name>/<created>` → `<name>` */
export function versionNameOf(modelArn: string): string {
  const match = /:project\/[^/]+\/version\/([^/]+)\//.exec(modelArn);
  if (!match) {
    throw new PipelineError("missing_config", `Not a Rekognition model version ARN: ${modelArn}`);
  }
  return match[1];
}

export class RekognitionLabelService implements LabelService, ModelStatusService {
  constructor(private readonly client: RekognitionClient) {}

  async detect(image: Buffer, modelArn: string, minConfidence: number): Promise<Label[]> {
    const response = await this.client.send(
      new DetectCustomLabelsCommand({
        ProjectVersionArn: modelArn,
        Image: { Bytes: image },
        MinConfidence: minConfidence
      })
    );
    return (response.CustomLabels ?? []).flatMap((customLabel) => {
      const label = toLabel(customLabel);
      return label ? [label] : [];
    });
  }

  async modelStatus(projectArn: string, modelArn: string): Promise<string | null> {
    const response = await this.client.send(
      new DescribeProjectVersionsCommand({
        ProjectArn: projectArn,
        VersionNames: [versionNameOf(modelArn)]
      })
    );
    return response.ProjectVersionDescriptions?.[0]?.Status ?? null;
  }
}
