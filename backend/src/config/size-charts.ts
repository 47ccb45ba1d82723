import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { MEASUREMENT_NAMES, type Gender, type SizeChart } from '../types/contracts.js';
import { InvalidSizeChartError } from '../lib/errors.js';

const RangeSchema = z
  .tuple([z.number().finite(), z.number().finite()])
  .refine(([low]) => low >= 0, { message: 'bounds must not be negative' })
  .refine(([low, high]) => low <= high, { message: 'low bound is above high bound' });

const SizeRangesSchema = z
  .record(z.enum(MEASUREMENT_NAMES), RangeSchema)
  .refine(ranges => Object.keys(ranges).length > 0, { message: 'size defines no measurement ranges' });

/** `{ "S": { "chest": [86, 91] }, ... }`, sizes in key order. */
const ChartObjectSchema = z
  .record(z.string().trim().min(1), SizeRangesSchema)
  .refine(chart => Object.keys(chart).length > 0, { message: 'chart has no sizes' });

/** `[{ "label": "S", "ranges": { "chest": [86, 91] } }, ...]`, for charts whose order matters. */
const ChartListSchema = z
  .array(z.object({ label: z.string().trim().min(1), ranges: SizeRangesSchema }))
  .min(1, { message: 'chart has no sizes' })
  .refine(sizes => new Set(sizes.map(size => size.label)).size === sizes.length, {
    message: 'size labels must be unique'
  });

const SizeChartSchema = z.union([ChartListSchema, ChartObjectSchema]);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      if (issue.code === z.ZodIssueCode.invalid_union) {
        return 'expected a list of sizes or an object of per-size measurement ranges';
      }
      return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function parseSizeChart(input: unknown): SizeChart {
  const parsed = SizeChartSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSizeChartError(formatIssues(parsed.error));
  }

  const chart = parsed.data;
  if (Array.isArray(chart)) return chart;
  return Object.entries(chart).map(([label, ranges]) => ({ label, ranges }));
}

export function parseSizeChartJson(text: string): SizeChart {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new InvalidSizeChartError('size_chart is not valid JSON');
  }
  return parseSizeChart(json);
}

const StandardChartsSchema = z.object({
  male: ChartObjectSchema,
  female: ChartObjectSchema
});

function loadStandardCharts(): Record<'male' | 'female', SizeChart> {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/size-charts.json', import.meta.url), 'utf8'));
  const charts = StandardChartsSchema.parse(raw);
  return {
    male: parseSizeChart(charts.male),
    female: parseSizeChart(charts.female)
  };
}

export const STANDARD_SIZE_CHARTS = loadStandardCharts();

/** Unisex sizing follows the men's chart. */
export function standardChart(gender: Gender): SizeChart {
  return gender === 'female' ? STANDARD_SIZE_CHARTS.female : STANDARD_SIZE_CHARTS.male;
}
