/**
 * Pipeline Orchestrator
 *
 * Runs loans one after another. Each loan is opened through the vendor
 * client, dispatched to the audiobook or ebook processor, and reported as a
 * result value; a failed loan is logged and the next one still runs.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { AppContext } from './app-context';
import { processAudiobookLoan, type ProcessOutcome } from './audiobook-processor';
import { generateBookPaths, type BookPaths } from './book-paths';
import { processEbookLoan } from './ebook-processor';
import { ConfigError, LoanpackError, errorMessage } from './errors';
import { extractAuthors, withOpenBook, type LoanManifest } from './loan-types';
import type { VendorClient } from './vendor-client';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PipelineContext extends AppContext {
  vendor: VendorClient;
}

export type LoanStatus = 'created' | 'already-exists' | 'failed';

export interface LoanResult {
  status: LoanStatus;
  loanId: string;
  title: string;
  outputs?: string[];
  reason?: string;
}

export interface LoanSelection {
  // 1-based positions in the loan list
  select?: number[];
  latest?: number;
  all?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Selection
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse `1,3, 4` into positions
 */
export function parseSelection(text: string): number[] {
  const positions = text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      if (!/^\d+$/.test(part)) {
        throw new ConfigError(`Invalid loan number "${part}"`);
      }
      return Number(part);
    });
  return positions;
}

/**
 * Pick loans by position, by recency or all of them. Positions are 1-based,
 * deduplicated and returned in list order.
 */
export function selectLoans(loans: ReadonlyArray<LoanManifest>, selection: LoanSelection): LoanManifest[] {
  if (selection.all) {
    return [...loans];
  }
  if (selection.latest !== undefined) {
    if (!Number.isInteger(selection.latest) || selection.latest < 1) {
      throw new ConfigError(`--latest must be a positive number, got ${selection.latest}`);
    }
    return loans.slice(-selection.latest);
  }

  const positions = Array.from(new Set(selection.select ?? [])).sort((a, b) => a - b);
  for (const position of positions) {
    if (position < 1 || position > loans.length) {
      throw new ConfigError(`Invalid loan number ${position}: choose between 1 and ${loans.length}`);
    }
  }
  return positions.map((position) => loans[position - 1]);
}

/**
 * Save the synced loan list as JSON, in list order
 */
export async function exportLoans(loans: ReadonlyArray<LoanManifest>, filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(loans, null, 2), 'utf8');
}

/**
 * Paths a loan would be written to, without creating anything
 */
export function planLoans(loans: ReadonlyArray<LoanManifest>, ctx: AppContext): Array<{ loan: LoanManifest; paths: BookPaths }> {
  return loans.map((loan) => ({
    loan,
    paths: generateBookPaths(
      {
        id: loan.id,
        title: loan.title,
        authors: extractAuthors(loan.creators),
        series: loan.series,
        edition: loan.edition,
      },
      ctx.config
    ),
  }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Processing
// ─────────────────────────────────────────────────────────────────────────────

async function processLoan(ctx: PipelineContext, manifest: LoanManifest): Promise<ProcessOutcome> {
  const { vendor, config } = ctx;
  const opened = await vendor.fetchOpenBookAndToc(manifest);
  const loan = withOpenBook(manifest, opened.openbook);
  const headers = vendor.contentHeaders();

  if (loan.type === 'audiobook') {
    const mediaInfo = config.generateOpf ? await vendor.fetchMediaInfo(loan.id) : null;
    return processAudiobookLoan(ctx, { loan, parts: opened.parts, mediaInfo, headers });
  }

  const rosters = await vendor.fetchRosters(loan);
  const mediaInfo = await vendor.fetchMediaInfo(loan.id);
  return processEbookLoan(ctx, { loan, openbook: opened.openbook, rosters, mediaInfo, headers });
}

/**
 * Process loans sequentially
 */
export async function processLoans(loans: ReadonlyArray<LoanManifest>, ctx: PipelineContext): Promise<LoanResult[]> {
  const results: LoanResult[] = [];

  for (const [index, loan] of loans.entries()) {
    ctx.logger.info(`[PIPELINE] (${index + 1}/${loans.length}) ${loan.type} "${loan.title}"`);
    try {
      const outcome = await processLoan(ctx, loan);
      results.push({ status: outcome.status, loanId: loan.id, title: loan.title, outputs: outcome.outputs });
    } catch (err) {
      const reason = errorMessage(err);
      ctx.logger.error(`[PIPELINE] Failed "${loan.title}": ${reason}`, {
        kind: err instanceof LoanpackError ? err.kind : 'unexpected',
      });
      results.push({ status: 'failed', loanId: loan.id, title: loan.title, reason });
    }
  }

  const failed = results.filter((r) => r.status === 'failed').length;
  ctx.logger.info(`[PIPELINE] Done: ${results.length - failed} succeeded, ${failed} failed`);
  return results;
}
