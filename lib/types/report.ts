import type { CellValue, ColumnKind, SkippedStatistic, SourceDiagnostic } from './dataset';

export interface ColumnStructure {
  readonly name: string;
  readonly kind: ColumnKind;
  /** n − missing count, counted on every access */
  readonly nonNullCount: number;
}

export interface StructureReport {
  rowCount: number;
  columnCount: number;
  columns: ColumnStructure[];
  preview: Record<string, CellValue | null>[];
}

export interface MissingnessEntry {
  column: string;
  missingCount: number;
  missingPct: number;
}

/** Ordered by missing count, descending */
export type MissingnessReport = MissingnessEntry[];

// Statistics are null when the column has too few present values.
export interface DescriptiveStatistics {
  column: string;
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  q1: number | null;
  median: number | null;
  q3: number | null;
  max: number | null;
}

export interface OutlierSummary {
  column: string;
  q1: number | null;
  q3: number | null;
  iqr: number | null;
  lowerFence: number | null;
  upperFence: number | null;
  rowIndices: number[];
}

export interface BoxSummary {
  column: string;
  q1: number | null;
  median: number | null;
  q3: number | null;
  lowerFence: number | null;
  upperFence: number | null;
  whiskerLow: number | null;
  whiskerHigh: number | null;
  outliers: number[];
}

export interface HistogramBin {
  start: number;
  end: number;
  /** The last bin also holds values equal to `end`. */
  count: number;
}

export interface DensityPoint {
  x: number;
  density: number;
}

export type HistogramTransform = "none" | "log1p";

export interface Histogram {
  column: string;
  transform: HistogramTransform;
  valueCount: number;
  min: number | null;
  max: number | null;
  bins: HistogramBin[];
  density: DensityPoint[] | null;
}

export interface CategoryCount {
  value: string;
  count: number;
  share: number;
}

export interface CategoricalFrequency {
  column: string;
  total: number;
  entries: CategoryCount[];
}

export interface CorrelationMatrix {
  columns: string[];
  values: number[][];
}

export interface JointPoint {
  row: number;
  x: number;
  y: number;
  emphasis: number;
  size: number;
}

export interface JointFeatureSummary {
  x: string;
  y: string;
  emphasis: string;
  sizeRange: [number, number];
  points: JointPoint[];
}

export type InsightRuleId =
  | "financial_correlation"
  | "distribution_skew"
  | "dominant_categories"
  | "data_completeness"
  | "central_tendency";

export interface InsightRecord {
  rank: number;
  ruleId: InsightRuleId;
  message: string;
  values: Record<string, number | string>;
}

export interface ChartStyle {
  theme: string;
  figureSize: [number, number];
  fontFamily: string;
}

export interface EdaReport {
  structure: StructureReport;
  missingness: MissingnessReport;
  descriptive: DescriptiveStatistics[];
  outliers: OutlierSummary[];
  categories: CategoricalFrequency[];
  insights: InsightRecord[];
  skipped: SkippedStatistic[];
  diagnostics: SourceDiagnostic[];
}

export interface ChartArtifacts {
  style: ChartStyle;
  histograms: Histogram[];
  logHistograms: Histogram[];
  boxPlots: BoxSummary[];
  categoryBars: CategoricalFrequency[];
  correlation: CorrelationMatrix;
  joint: JointFeatureSummary | null;
}
