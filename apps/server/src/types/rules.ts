export interface LocationRuleSet {
  locationNames: string[];
  deviceNames: string[];
  extraNames: string[];
  floorExtra: string;
  floorClass: string;
  screenMarker: string;
  thresholds: Record<string, number>;
  defaultThreshold: number;
  minConfidence: number;
  classToDir: Record<string, string>;
  unknownDir: string;
}

export interface MaterialRuleSet {
  materialNames: string[];
  objectNames: string[];
  extraNames: string[];
  floorExtra: string;
  waterMeterObjects: string[];
  radiometerObject: string;
  signObject: string;
  signSuffixes: string[];
  defaultSuffix: string;
  prefixAliases: Record<string, string>;
  deviceToObject: Record<string, string>;
  thresholds: Record<string, number>;
  defaultThreshold: number;
  minConfidence: number;
  classToDir: Record<string, string>;
  unknownDir: string;
}

export interface TextReadingRules {
  eligibilityThresholds: Record<string, number>;
  screenLabelPrefix: string;
  screenConfidenceFloor: number;
  cropLabelNames: string[];
  cropConfidenceFloor: number;
  minCropWidth: number;
  minCropHeight: number;
}

export interface RuleSets {
  location: LocationRuleSet;
  material: MaterialRuleSet;
  textReading: TextReadingRules;
}
