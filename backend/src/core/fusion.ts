import {
  MEASUREMENT_NAMES,
  type MeasurementName,
  type MeasurementSet,
  type PipelineWarning,
  type ViewAngle
} from '../types/contracts.js';
import { VIEW_COVERAGE } from '../config/body-model.js';
import { mean } from './geometry.js';

export type ViewMeasurements = {
  front: MeasurementSet;
  back?: MeasurementSet | null;
  side?: MeasurementSet | null;
};

function covers(view: ViewAngle, name: MeasurementName): boolean {
  return view === 'front' || VIEW_COVERAGE[view].includes(name);
}

function valuesFor(name: MeasurementName, views: ViewMeasurements): Array<[ViewAngle, number]> {
  const values: Array<[ViewAngle, number]> = [['front', views.front[name]]];
  if (views.back && covers('back', name)) values.push(['back', views.back[name]]);
  if (views.side && covers('side', name)) values.push(['side', views.side[name]]);
  return values;
}

/**
 * Reconciles per-view estimates by plain averaging over the views that can see
 * each measurement. Front-only measurements keep the front value.
 */
export function fuseMeasurements(views: ViewMeasurements): MeasurementSet {
  const fused = { ...views.front };
  for (const name of MEASUREMENT_NAMES) {
    fused[name] = mean(valuesFor(name, views).map(([, value]) => value));
  }
  return fused;
}

/** Measurements whose views disagree by more than `thresholdPercent` of the smallest value. */
export function detectConflicts(views: ViewMeasurements, thresholdPercent: number): PipelineWarning[] {
  const warnings: PipelineWarning[] = [];

  for (const name of MEASUREMENT_NAMES) {
    const values = valuesFor(name, views);
    if (values.length < 2) continue;

    const numbers = values.map(([, value]) => value);
    const low = Math.min(...numbers);
    const high = Math.max(...numbers);
    if (low <= 0) continue;

    const spread = ((high - low) / low) * 100;
    if (spread > thresholdPercent) {
      const detail = values.map(([view, value]) => `${view} ${value.toFixed(1)}cm`).join(', ');
      warnings.push({
        kind: 'MeasurementConflict',
        message: `${name} differs by ${spread.toFixed(1)}% between views (${detail})`
      });
    }
  }

  return warnings;
}
