/**
 * Reading window sent to the ML collaborator
 */
export interface MlWindow {
  limit: number;
  hoursBack?: number;
}

export interface MlPrediction {
  value: number;
  timestamp: string;
  categoryRule: string;
  categoryMl: string | null;
  categoryConfidence: number | null;
  isAnomaly: boolean;
  anomalyScore: number;
}

export interface MlPredictionReport {
  totalReadings: number;
  predictions: MlPrediction[];
  summary: {
    totalReadings: number;
    avgValue: number;
    maxValue: number;
    minValue: number;
    anomalyCount: number;
  };
}

export interface MlAnalysis {
  totalReadings: number;
  avgLevel: number;
  stdLevel: number;
  minLevel: number;
  maxLevel: number;
  anomalyCount: number;
  anomalyPercentage: number;
  peakHour: number;
  quietestHour: number;
}

export interface MlHealth {
  status: string;
  databaseConnected: boolean;
  classifierLoaded: boolean;
  anomalyDetectorLoaded: boolean;
}

/**
 * Classification and anomaly-scoring collaborator.
 * Implementations throw MlServiceError when the service fails or answers badly.
 */
export interface MlClient {
  predict(window: MlWindow): Promise<MlPredictionReport>;
  analyze(window: MlWindow): Promise<MlAnalysis>;
  /** Resolves with the service's acknowledgement message. */
  train(minSamples: number): Promise<string>;
  health(): Promise<MlHealth>;
}
