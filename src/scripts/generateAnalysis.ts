import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { parseArgs } from 'node:util';
import { isProviderKind, loadProviderConfig } from '../config/providers';
import { defaultDocumentId, startAnalysis } from '../services/analysisService';
import { SourceText } from '../services/chunking';
import { getStateLabel } from '../services/pipeline';
import type { Snapshot } from '../types/analysis';

const USAGE =
  'Usage: npm run analyze -- <file.txt> [--title T] [--author A] [--document ID] [--step 10] [--provider gemini|chatgpt|local] [--verbose]';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    title: { type: 'string' },
    author: { type: 'string' },
    document: { type: 'string' },
    step: { type: 'string', default: '10' },
    provider: { type: 'string' },
    verbose: { type: 'boolean', default: false },
  },
});

const file = positionals[0];
const step = Number(values.step);

if (!file || !Number.isInteger(step) || step < 1 || step > 100) {
  console.error(USAGE);
  process.exit(1);
}

if (values.provider !== undefined && !isProviderKind(values.provider)) {
  console.error(`Unknown provider "${values.provider}"`);
  console.error(USAGE);
  process.exit(1);
}

function percentSteps(stepSize: number): number[] {
  const steps: number[] = [];
  for (let percent = stepSize; percent < 100; percent += stepSize) {
    steps.push(percent);
  }
  steps.push(100);
  return steps;
}

async function generateAnalysis(path: string) {
  const title = values.title ?? basename(path, extname(path));
  const author = values.author ?? '';
  const documentId = values.document ?? defaultDocumentId(title, author);
  const config = loadProviderConfig(
    values.provider !== undefined && isProviderKind(values.provider) ? values.provider : undefined,
  );
  const source = SourceText.fromString(await readFile(path, 'utf8'));

  console.log(`Analyzing "${title}" (${source.totalLength} bytes) with ${config.kind}/${config.model}`);

  let snapshot: Snapshot | null = null;
  for (const percent of percentSteps(step)) {
    const task = startAnalysis(title, author, source, percent, snapshot, { documentId, config });
    if (values.verbose) {
      task.on('state', (state) => console.log(`  ${percent}%: ${getStateLabel(state)}`));
    }
    const outcome = await task.result;

    switch (outcome.status) {
      case 'completed': {
        snapshot = outcome.snapshot;
        const note = outcome.degradedBy ? ` (stopped early: ${outcome.degradedBy.message})` : '';
        console.log(
          `✓ ${percent}%: ${snapshot.characters?.length ?? 0} characters, ` +
            `${snapshot.locations?.length ?? 0} locations, ${snapshot.timeline?.length ?? 0} events${note}`,
        );
        break;
      }
      case 'aborted':
        console.log(`✗ ${percent}%: aborted`);
        process.exit(1);
        break;
      case 'failed':
        console.error(`✗ ${percent}%: ${outcome.error.kind} - ${outcome.error.message}`);
        process.exit(1);
    }
  }

  process.exit(0);
}

generateAnalysis(file).catch((error: unknown) => {
  console.error('Error generating analysis:', error);
  process.exit(1);
});
