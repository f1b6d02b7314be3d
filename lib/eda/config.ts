/**
 * Per-run configuration for the EDA pipeline
 */

import type { ChartStyle } from '../types/report';
import { EdaConfigError } from './errors';

export interface EdaColumnsConfig {
  financialPair: [string, string];
  emphasis: string;
  category: string;
  modal: string;
  boxPlot: string[];
  logScale: string[];
}

export interface EdaChartConfig {
  sizeRange: [number, number];
  style: ChartStyle;
}

export interface EdaConfig {
  histogramBins: number;
  iqrMultiplier: number;
  correlationThreshold: number;  // |r| at or above fires the financial insight
  missingThresholdPct: number;   // percent, 0..100
  topCategories: number;         // dominant-category insight
  densityPoints: number;
  reportTopCategories: number;   // rows per table in the text report
  previewRows: number;
  columns: EdaColumnsConfig;
  chart: EdaChartConfig;
}

export type EdaConfigOverrides = Partial<Omit<EdaConfig, 'columns' | 'chart'>> & {
  columns?: Partial<EdaColumnsConfig>;
  chart?: Partial<Omit<EdaChartConfig, 'style'>> & { style?: Partial<ChartStyle> };
};

export const DEFAULT_EDA_CONFIG: EdaConfig = {
  histogramBins: 10,
  iqrMultiplier: 1.5,
  correlationThreshold: 0.7,
  missingThresholdPct: 5.0,
  topCategories: 2,
  densityPoints: 200,
  reportTopCategories: 5,
  previewRows: 5,
  columns: {
    financialPair: ['budget', 'revenue'],
    emphasis: 'vote_average',
    category: 'genre',
    modal: 'runtime',
    boxPlot: ['budget', 'revenue', 'runtime'],
    logScale: ['budget']
  },
  chart: {
    sizeRange: [20, 200],
    style: {
      theme: 'whitegrid',
      figureSize: [10, 6],
      fontFamily: 'Inter'
    }
  }
};

/**
 * Merge overrides onto the defaults, nested sections field by field.
 * Does not validate; see resolveEdaConfig.
 */
export function createEdaConfig(overrides: EdaConfigOverrides = {}): EdaConfig {
  const { columns, chart, ...scalars } = overrides;
  return {
    ...DEFAULT_EDA_CONFIG,
    ...scalars,
    columns: {
      ...DEFAULT_EDA_CONFIG.columns,
      ...columns
    },
    chart: {
      sizeRange: chart?.sizeRange ?? DEFAULT_EDA_CONFIG.chart.sizeRange,
      style: {
        ...DEFAULT_EDA_CONFIG.chart.style,
        ...chart?.style
      }
    }
  };
}

const isPositiveInt = (x: number) => Number.isInteger(x) && x >= 1;

/**
 * Every out-of-domain option, as human-readable issues. Empty when valid.
 */
export function validateEdaConfig(config: EdaConfig): string[] {
  const issues: string[] = [];

  if (!isPositiveInt(config.histogramBins)) {
    issues.push(`histogramBins must be a positive integer (got ${config.histogramBins})`);
  }
  if (!Number.isFinite(config.iqrMultiplier) || config.iqrMultiplier < 0) {
    issues.push(`iqrMultiplier must be a finite number >= 0 (got ${config.iqrMultiplier})`);
  }
  if (!(config.correlationThreshold >= 0 && config.correlationThreshold <= 1)) {
    issues.push(`correlationThreshold must be within [0, 1] (got ${config.correlationThreshold})`);
  }
  if (!(config.missingThresholdPct >= 0 && config.missingThresholdPct <= 100)) {
    issues.push(`missingThresholdPct must be within [0, 100] (got ${config.missingThresholdPct})`);
  }
  if (!isPositiveInt(config.topCategories)) {
    issues.push(`topCategories must be a positive integer (got ${config.topCategories})`);
  }
  if (!Number.isInteger(config.densityPoints) || config.densityPoints < 2) {
    issues.push(`densityPoints must be an integer >= 2 (got ${config.densityPoints})`);
  }
  if (!isPositiveInt(config.reportTopCategories)) {
    issues.push(`reportTopCategories must be a positive integer (got ${config.reportTopCategories})`);
  }
  if (!Number.isInteger(config.previewRows) || config.previewRows < 0) {
    issues.push(`previewRows must be a non-negative integer (got ${config.previewRows})`);
  }

  const { financialPair, emphasis, category, modal } = config.columns;
  for (const [label, name] of [
    ['columns.financialPair[0]', financialPair[0]],
    ['columns.financialPair[1]', financialPair[1]],
    ['columns.emphasis', emphasis],
    ['columns.category', category],
    ['columns.modal', modal]
  ] as const) {
    if (!name || !name.trim()) issues.push(`${label} must name a column`);
  }

  const [lo, hi] = config.chart.sizeRange;
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo < 0 || lo > hi) {
    issues.push(`chart.sizeRange must satisfy 0 <= min <= max (got [${lo}, ${hi}])`);
  }
  const [w, h] = config.chart.style.figureSize;
  if (!(w > 0 && h > 0 && Number.isFinite(w) && Number.isFinite(h))) {
    issues.push(`chart.style.figureSize must be positive (got [${w}, ${h}])`);
  }

  return issues;
}

/**
 * Merge and validate in one step.
 * @throws EdaConfigError listing every invalid option
 */
export function resolveEdaConfig(overrides: EdaConfigOverrides = {}): EdaConfig {
  const config = createEdaConfig(overrides);
  const issues = validateEdaConfig(config);
  if (issues.length > 0) {
    throw new EdaConfigError(issues);
  }
  return config;
}

const ENV_NUMBERS = {
  EDA_HISTOGRAM_BINS: 'histogramBins',
  EDA_IQR_MULTIPLIER: 'iqrMultiplier',
  EDA_CORRELATION_THRESHOLD: 'correlationThreshold',
  EDA_MISSING_THRESHOLD_PCT: 'missingThresholdPct',
  EDA_TOP_CATEGORIES: 'topCategories'
} as const;

export interface EdaEnv {
  source?: string;
  overrides: EdaConfigOverrides;
}

/**
 * Read EDA_* variables. Unset or blank variables are ignored.
 * @throws EdaConfigError when a numeric variable does not parse
 */
export function readEdaEnv(env: NodeJS.ProcessEnv = process.env): EdaEnv {
  const overrides: EdaConfigOverrides = {};
  const issues: string[] = [];

  for (const [variable, key] of Object.entries(ENV_NUMBERS)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push(`${variable} is not a number (got "${raw}")`);
      continue;
    }
    overrides[key] = value;
  }

  if (issues.length > 0) {
    throw new EdaConfigError(issues);
  }

  const source = env.EDA_SOURCE?.trim();
  return { source: source || undefined, overrides };
}
