/**
 * Research Command Completion
 *
 * What happens after the Ink app for `research` exits: failed runs set the
 * exit code (the app already showed the error), successful runs are saved
 * when --output was given.
 */
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { formatReport } from '../report/markdown.js';
import type { ResearchOutcome } from '../ui/components/index.js';
import { cliLogger } from '../utils/logger.js';

export async function finishResearchCommand(outcome: ResearchOutcome, output?: string): Promise<void> {
  if (!outcome.ok) {
    cliLogger.error({ error: outcome.error.message, stack: outcome.error.stack }, 'Research failed');
    process.exitCode = 1;
    return;
  }

  if (output) {
    const outputPath = resolve(output);
    await writeFile(outputPath, formatReport(outcome.result), 'utf-8');
    cliLogger.info({ outputPath }, 'Report saved');
    console.log(`✓ Results saved to: ${outputPath}`);
  }
}
