import type {
  CategoricalFrequency,
  CorrelationMatrix,
  DescriptiveStatistics,
  Histogram,
  InsightRecord,
  InsightRuleId,
  MissingnessReport
} from '../types/report';
import type { ColumnKind, Dataset, SkippedStatistic } from '../types/dataset';
import { getColumn } from '../ingestion/dataset';
import type { EdaConfig } from './config';
import { correlationBetween } from './bivariate';
import { formatPct, formatStat, joinWords } from './format';

/** Everything the rules may read: outputs of the four analysis stages. */
export interface InsightContext {
  config: EdaConfig;
  missingness: MissingnessReport;
  descriptive: DescriptiveStatistics[];
  histograms: Histogram[];
  categories: CategoricalFrequency[];
  correlation: CorrelationMatrix;
}

export interface InsightFinding {
  message: string;
  values: Record<string, number | string>;
}

/**
 * A threshold rule: a pure function from the context to zero or more
 * findings. Rules never throw on undefined inputs; they just return [].
 */
export interface InsightRule {
  id: InsightRuleId;
  priority: number;
  evaluate(ctx: InsightContext): InsightFinding[];
}

export const financialCorrelationRule: InsightRule = {
  id: 'financial_correlation',
  priority: 1,
  evaluate({ config, correlation }) {
    const [a, b] = config.columns.financialPair;
    const r = correlationBetween(correlation, a, b);
    if (Number.isNaN(r) || Math.abs(r) < config.correlationThreshold) return [];

    const direction = r > 0 ? 'positive' : 'negative';
    return [
      {
        message: `High correlation in financials: "${a}" and "${b}" show a strong ${direction} correlation (r = ${r.toFixed(2)}).`,
        values: { columnA: a, columnB: b, r, threshold: config.correlationThreshold }
      }
    ];
  }
};

export const distributionSkewRule: InsightRule = {
  id: 'distribution_skew',
  priority: 2,
  evaluate({ descriptive }) {
    const findings: InsightFinding[] = [];
    for (const s of descriptive) {
      if (s.mean === null || s.median === null || s.std === null) continue;
      if (s.mean - s.median <= s.std) continue;
      findings.push({
        message:
          `Distribution skew: "${s.column}" is right-skewed; its mean (${formatStat(s.mean)}) exceeds ` +
          `its median (${formatStat(s.median)}) by more than one standard deviation (${formatStat(s.std)}).`,
        values: { column: s.column, mean: s.mean, median: s.median, std: s.std }
      });
    }
    return findings;
  }
};

export const dominantCategoriesRule: InsightRule = {
  id: 'dominant_categories',
  priority: 3,
  evaluate({ config, categories }) {
    const column = config.columns.category;
    const freq = categories.find((c) => c.column === column);
    if (!freq || freq.entries.length === 0) return [];

    const top = freq.entries.slice(0, config.topCategories);
    const values: Record<string, number | string> = { column };
    top.forEach((e, i) => {
      values[`top${i + 1}`] = e.value;
      values[`top${i + 1}Share`] = e.share * 100;
    });

    const listed = joinWords(top.map((e) => `"${e.value}" (${formatPct(e.share * 100)})`));
    const verb = top.length === 1 ? 'is the most dominant value' : 'are the most dominant values';
    return [{ message: `Key category popularity: ${listed} ${verb} of "${column}".`, values }];
  }
};

export const dataCompletenessRule: InsightRule = {
  id: 'data_completeness',
  priority: 4,
  evaluate({ config, missingness }) {
    return missingness
      .filter((m) => m.missingPct > config.missingThresholdPct)
      .map((m) => ({
        message:
          `Data completeness: "${m.column}" is missing ${formatPct(m.missingPct)} of values ` +
          `(${m.missingCount} rows, above the ${formatPct(config.missingThresholdPct)} threshold).`,
        values: { column: m.column, missingCount: m.missingCount, missingPct: m.missingPct }
      }));
  }
};

export const centralTendencyRule: InsightRule = {
  id: 'central_tendency',
  priority: 5,
  evaluate({ config, histograms }) {
    const column = config.columns.modal;
    const hist = histograms.find((h) => h.column === column && h.transform === 'none');
    if (!hist || hist.bins.length === 0) return [];

    let modal = 0;
    hist.bins.forEach((b, i) => {
      if (b.count > hist.bins[modal].count) modal = i;
    });
    const bin = hist.bins[modal];
    const close = modal === hist.bins.length - 1 ? ']' : ')';

    return [
      {
        message:
          `Central tendency: "${column}" values cluster in [${formatStat(bin.start)}, ${formatStat(bin.end)}${close} ` +
          `(${bin.count} of ${hist.valueCount} values).`,
        values: { column, binStart: bin.start, binEnd: bin.end, count: bin.count, total: hist.valueCount }
      }
    ];
  }
};

/** Declaration order doubles as the tie-break for equal priorities. */
export const DEFAULT_INSIGHT_RULES: readonly InsightRule[] = [
  financialCorrelationRule,
  distributionSkewRule,
  dominantCategoriesRule,
  dataCompletenessRule,
  centralTendencyRule
];

/**
 * Evaluate every rule and rank what fires by rule priority, then rule
 * declaration order, then emission order within a rule.
 */
export function synthesizeInsights(
  ctx: InsightContext,
  rules: readonly InsightRule[] = DEFAULT_INSIGHT_RULES
): InsightRecord[] {
  const fired: { priority: number; ruleIndex: number; seq: number; ruleId: InsightRuleId; finding: InsightFinding }[] = [];

  rules.forEach((rule, ruleIndex) => {
    rule.evaluate(ctx).forEach((finding, seq) => {
      fired.push({ priority: rule.priority, ruleIndex, seq, ruleId: rule.id, finding });
    });
  });

  fired.sort((a, b) => a.priority - b.priority || a.ruleIndex - b.ruleIndex || a.seq - b.seq);

  return fired.map((f, i) => ({
    rank: i + 1,
    ruleId: f.ruleId,
    message: f.finding.message,
    values: f.finding.values
  }));
}

/**
 * Skip records for rules whose input columns are absent or of the wrong
 * kind. Those rules simply do not fire; this only makes the reason visible.
 */
export function insightInputGaps(dataset: Dataset, config: EdaConfig): SkippedStatistic[] {
  const required: [InsightRuleId, string, ColumnKind][] = [
    ['financial_correlation', config.columns.financialPair[0], 'numeric'],
    ['financial_correlation', config.columns.financialPair[1], 'numeric'],
    ['dominant_categories', config.columns.category, 'categorical'],
    ['central_tendency', config.columns.modal, 'numeric']
  ];

  const skipped: SkippedStatistic[] = [];
  for (const [statistic, column, kind] of required) {
    const col = getColumn(dataset, column);
    if (col && col.kind === kind) continue;
    skipped.push({
      stage: 'insights',
      statistic,
      column,
      reason: col ? `column is ${col.kind}, not ${kind}` : 'column is absent'
    });
  }
  return skipped;
}
