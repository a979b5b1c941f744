import type { RunSummary } from '../types/comparison-types.js';

import { JsonReportRenderer } from './json-report-renderer.js';
import { TextReportRenderer } from './text-report-renderer.js';

export type ReportFormat = 'json' | 'text';

export interface RenderOptions {
  /** ANSI colours in text output. Ignored by the JSON renderer. */
  color?: boolean | undefined;
}

export interface ReportRenderer {
  render(summary: RunSummary): string;
}

export function createReportRenderer(format: ReportFormat, options: RenderOptions = {}): ReportRenderer {
  switch (format) {
    case 'json':
      return new JsonReportRenderer();
    case 'text':
      return new TextReportRenderer({ color: options.color ?? false });
  }
}

/**
 * Render a summary in the requested format. Pure: the caller decides where the string goes.
 */
export function renderReport(summary: RunSummary, format: ReportFormat, options: RenderOptions = {}): string {
  return createReportRenderer(format, options).render(summary);
}
