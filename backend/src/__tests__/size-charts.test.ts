import { describe, it, expect } from 'vitest';
import { STANDARD_SIZE_CHARTS, parseSizeChart, parseSizeChartJson, standardChart } from '../config/size-charts.js';
import { InvalidSizeChartError } from '../lib/errors.js';

describe('standard size charts', () => {
  it('loads both charts in size order', () => {
    expect(STANDARD_SIZE_CHARTS.male.map(size => size.label)).toEqual(['XS', 'S', 'M', 'L', 'XL', 'XXL']);
    expect(STANDARD_SIZE_CHARTS.female.map(size => size.label)).toEqual(['XS', 'S', 'M', 'L', 'XL', 'XXL']);
    expect(STANDARD_SIZE_CHARTS.male[2]?.ranges.chest).toEqual([91, 97]);
  });

  it('sizes unisex requests on the men’s chart', () => {
    expect(standardChart('unisex')).toBe(STANDARD_SIZE_CHARTS.male);
    expect(standardChart('male')).toBe(STANDARD_SIZE_CHARTS.male);
    expect(standardChart('female')).toBe(STANDARD_SIZE_CHARTS.female);
  });
});

describe('parseSizeChart', () => {
  it('accepts an object keyed by size label', () => {
    expect(parseSizeChart({ S: { chest: [86, 91] }, M: { chest: [91, 97], waist: [76, 81] } })).toEqual([
      { label: 'S', ranges: { chest: [86, 91] } },
      { label: 'M', ranges: { chest: [91, 97], waist: [76, 81] } }
    ]);
  });

  it('keeps list order', () => {
    const chart = parseSizeChart([
      { label: 'L', ranges: { chest: [97, 102] } },
      { label: 'S', ranges: { chest: [86, 91] } }
    ]);
    expect(chart.map(size => size.label)).toEqual(['L', 'S']);
  });

  it('orders integer-like labels numerically in object form', () => {
    const chart = parseSizeChartJson('{"42": {"chest": [96, 100]}, "38": {"chest": [88, 92]}}');
    expect(chart.map(size => size.label)).toEqual(['38', '42']);
  });

  it('rejects inverted and negative ranges', () => {
    expect(() => parseSizeChart({ S: { chest: [91, 86] } })).toThrow(
      'Invalid size chart: S.chest: low bound is above high bound'
    );
    expect(() => parseSizeChart({ S: { chest: [-1, 86] } })).toThrow(
      'Invalid size chart: S.chest: bounds must not be negative'
    );
  });

  it('rejects empty charts and sizes', () => {
    expect(() => parseSizeChart({})).toThrow('Invalid size chart: chart has no sizes');
    expect(() => parseSizeChart([])).toThrow('Invalid size chart: chart has no sizes');
    expect(() => parseSizeChart({ S: {} })).toThrow('Invalid size chart: S: size defines no measurement ranges');
  });

  it('rejects duplicate labels', () => {
    expect(() =>
      parseSizeChart([
        { label: 'M', ranges: { chest: [91, 97] } },
        { label: 'M', ranges: { chest: [97, 102] } }
      ])
    ).toThrow('Invalid size chart: size labels must be unique');
  });

  it('rejects unknown shapes', () => {
    expect(() => parseSizeChart('S')).toThrow(InvalidSizeChartError);
    expect(() => parseSizeChart({ S: { collar: [38, 40] } })).toThrow(InvalidSizeChartError);
  });
});

describe('parseSizeChartJson', () => {
  it('rejects malformed JSON', () => {
    expect(() => parseSizeChartJson('{oops')).toThrow('Invalid size chart: size_chart is not valid JSON');
  });
});
