import type { Dataset, LoadResult } from '../types/dataset';
import type { ChartArtifacts, EdaReport } from '../types/report';
import { loadDataset } from '../ingestion/loader';
import { defaultSourcePath } from '../paths';
import { resolveEdaConfig, type EdaConfig, type EdaConfigOverrides } from './config';
import { consoleLogger, type EdaLogger } from './logger';
import { inspectStructure } from './inspector';
import { assessMissingness, describeNumeric, detectOutliers, summarizeBoxPlots } from './quality';
import { analyzeUnivariate } from './univariate';
import { computeCorrelationMatrix, summarizeJointFeatures } from './bivariate';
import { insightInputGaps, synthesizeInsights } from './insights';

export interface EdaRunOptions {
  /** Tabular file to analyze; defaults to $DATA_ROOT/tmdb_movies.csv */
  source?: string;
  config?: EdaConfigOverrides;
  logger?: EdaLogger;
}

export interface EdaRun {
  config: EdaConfig;
  dataset: Dataset;
  report: EdaReport;
  charts: ChartArtifacts;
}

/**
 * Run the analysis stages over an already loaded dataset.
 * The dataset is only read; every artifact is built fresh.
 */
export function analyzeDataset(
  load: LoadResult,
  config: EdaConfig,
  logger: EdaLogger = consoleLogger
): EdaRun {
  const { dataset, diagnostics } = load;

  logger.log('[eda:inspector] Inspecting structure');
  const structure = inspectStructure(dataset, config.previewRows);

  logger.log('[eda:quality] Assessing missing values and outliers');
  const missingness = assessMissingness(dataset);
  const descriptive = describeNumeric(dataset);
  const outliers = detectOutliers(dataset, config.iqrMultiplier);
  const box = summarizeBoxPlots(dataset, config.columns.boxPlot, config.iqrMultiplier);

  logger.log('[eda:univariate] Summarizing distributions');
  const univariate = analyzeUnivariate(dataset, {
    bins: config.histogramBins,
    densityPoints: config.densityPoints,
    logScaleColumns: config.columns.logScale
  });

  logger.log('[eda:bivariate] Computing correlations');
  const correlation = computeCorrelationMatrix(dataset);
  const [xName, yName] = config.columns.financialPair;
  const joint = summarizeJointFeatures(dataset, xName, yName, config.columns.emphasis, config.chart.sizeRange);

  logger.log('[eda:insights] Synthesizing insights');
  const insights = synthesizeInsights({
    config,
    missingness,
    descriptive,
    histograms: univariate.histograms,
    categories: univariate.categories,
    correlation
  });

  const skipped = [
    ...box.skipped,
    ...univariate.skipped,
    ...joint.skipped,
    ...insightInputGaps(dataset, config)
  ];
  for (const s of skipped) {
    logger.warn(`[eda:${s.stage}] Skipped ${s.statistic} for "${s.column}": ${s.reason}`);
  }

  return {
    config,
    dataset,
    report: {
      structure,
      missingness,
      descriptive,
      outliers,
      categories: univariate.categories,
      insights,
      skipped,
      diagnostics
    },
    charts: {
      style: { ...config.chart.style },
      histograms: univariate.histograms,
      logHistograms: univariate.logHistograms,
      boxPlots: box.boxes,
      categoryBars: univariate.categories,
      correlation,
      joint: joint.joint
    }
  };
}

/**
 * Validate configuration, load the source (falling back to the built-in
 * sample) and run every stage in order.
 * @throws EdaConfigError before anything is loaded when an option is out of domain
 */
export function runEdaPipeline(options: EdaRunOptions = {}): EdaRun {
  const logger = options.logger ?? consoleLogger;
  const config = resolveEdaConfig(options.config);
  const load = loadDataset(options.source ?? defaultSourcePath(), logger);
  const run = analyzeDataset(load, config, logger);
  logger.log(`[eda] Completed with ${run.report.insights.length} insight(s)`);
  return run;
}
