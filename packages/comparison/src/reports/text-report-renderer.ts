import { formatBlockRef } from '@soundness/core';
import pc from 'picocolors';

import type { AccountComparisonResult, ComparisonOutcome, FetchOutcome, RunSummary } from '../types/comparison-types.js';

import type { ReportRenderer } from './report-renderer.js';

type Colors = ReturnType<typeof pc.createColors>;

const OUTCOME_ICONS: Record<ComparisonOutcome, string> = {
  FETCH_ERROR: '⚠️',
  MATCH: '✅',
  MISMATCH_BALANCE: '❌',
  MISMATCH_BOTH: '❌',
  MISMATCH_NONCE: '❌',
};

/**
 * Human-readable report:
 *
 * ```
 * 🔧 zk-account-soundness
 * 🔗 Source A: http://127.0.0.1:8545
 * 🔗 Source B: http://127.0.0.1:9545
 * 🧱 Block A: latest | Block B: latest
 * 👥 Accounts: 2
 * 🕒 Timestamp: 2024-01-01T00:00:00.000Z
 *
 * 📊 Results:
 *   • 0x1111...: Balance 5 vs 5, Nonce 1 vs 1 → ✅ MATCH
 *   • 0x2222...: Balance 7 vs ERR, Nonce 2 vs ERR → ⚠️ FETCH_ERROR (B: TIMEOUT)
 *
 * 🚨 1 account(s) differ between the two sources (0 mismatched, 1 fetch errors).
 * ⏱️ Elapsed: 0.42s
 * ```
 */
export class TextReportRenderer implements ReportRenderer {
  private readonly colors: Colors;

  constructor(options: { color: boolean }) {
    this.colors = pc.createColors(options.color);
  }

  render(summary: RunSummary): string {
    const lines = [
      this.colors.bold('🔧 zk-account-soundness'),
      `🔗 Source A: ${summary.sourceA.endpoint}`,
      `🔗 Source B: ${summary.sourceB.endpoint}`,
      `🧱 Block A: ${formatBlockRef(summary.sourceA.blockRef)} | Block B: ${formatBlockRef(summary.sourceB.blockRef)}`,
      `👥 Accounts: ${summary.counts.total}`,
      `🕒 Timestamp: ${summary.timestamp}`,
      '',
      '📊 Results:',
      ...summary.results.map((result) => this.formatResult(result)),
      '',
      this.formatVerdict(summary),
      `⏱️ Elapsed: ${(summary.elapsedMs / 1000).toFixed(2)}s`,
    ];
    return lines.join('\n');
  }

  private formatResult(result: AccountComparisonResult): string {
    const balances = `Balance ${balanceText(result.stateA)} vs ${balanceText(result.stateB)}`;
    const nonces = `Nonce ${nonceText(result.stateA)} vs ${nonceText(result.stateB)}`;
    const line = `  • ${result.address}: ${balances}, ${nonces} → ${this.formatOutcome(result.outcome)}`;

    const errors = [errorKind('A', result.stateA), errorKind('B', result.stateB)].filter(
      (text): text is string => text !== undefined
    );
    return errors.length === 0 ? line : `${line} ${this.colors.dim(`(${errors.join(', ')})`)}`;
  }

  private formatOutcome(outcome: ComparisonOutcome): string {
    const label = `${OUTCOME_ICONS[outcome]} ${outcome}`;
    switch (outcome) {
      case 'MATCH':
        return this.colors.green(label);
      case 'FETCH_ERROR':
        return this.colors.yellow(label);
      default:
        return this.colors.red(label);
    }
  }

  private formatVerdict(summary: RunSummary): string {
    if (summary.overallStatus === 'OK') {
      return this.colors.green('🎯 Account states match across both sources.');
    }
    const { fetchError, mismatch } = summary.counts;
    return this.colors.red(
      `🚨 ${mismatch + fetchError} account(s) differ between the two sources (${mismatch} mismatched, ${fetchError} fetch errors).`
    );
  }
}

function balanceText(outcome: FetchOutcome): string {
  return outcome.ok ? outcome.state.balance.toString() : 'ERR';
}

function nonceText(outcome: FetchOutcome): string {
  return outcome.ok ? String(outcome.state.nonce) : 'ERR';
}

function errorKind(label: string, outcome: FetchOutcome): string | undefined {
  return outcome.ok ? undefined : `${label}: ${outcome.error.kind}`;
}
