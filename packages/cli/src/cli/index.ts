import { Command } from 'commander';
import fs from 'fs';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { reviewCommand } from './review.js';

// Get version from package.json dynamically
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

// Source layout: src/cli/index.ts; bundled layout: dist/index.js
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../package.json'];

function loadPackageJson(): unknown {
  const found = PACKAGE_JSON_CANDIDATES.map(candidate => join(__dirname, candidate)).find(file =>
    fs.existsSync(file),
  );
  return found === undefined ? undefined : require(found);
}

function packageVersion(): string {
  const packageJson = loadPackageJson();
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export const program = new Command();

program
  .name('critique')
  .description('Static pre-analysis plus AI review of a single source file')
  .version(packageVersion());

program
  .command('review')
  .description('Review one source file and print a scored report')
  .argument('<file>', 'File to review')
  .option('-q, --quick', 'Pre-analysis only, no AI review')
  .option('--format <type>', 'Output format: text, json', 'text')
  .option('-o, --out <path>', 'Also write the full review as JSON to this path')
  .option('-m, --model <id>', 'LLM model (overrides .critique/review.yml)')
  .option('-l, --language <id>', 'Language tag (detected from the extension by default)')
  .option('--fail-under <score>', 'Exit 1 if the score is below this value')
  .option('-v, --verbose', 'Show detailed logging')
  .action(reviewCommand);
