/**
 * Generate a winding from a preset, a JSON recipe or a share code and print it.
 *
 * Usage:
 *   npx tsx scripts/generate-winding.ts compact
 *   npx tsx scripts/generate-winding.ts power --format kicad --layer B.Cu
 *   npx tsx scripts/generate-winding.ts --json '{"width":20,"height":15,"cornerRadius":2,"trackWidth":0.2,"guard":0.2,"turns":3}'
 *   WINDING_SHARE_URL=https://example.com npx tsx scripts/generate-winding.ts --format share
 */

import { CliError, USAGE, parseCliArgs, renderFixture, resolveFixture } from './generate-winding-helpers';
import { RecipeError } from '../src/builder';
import { isWindingError } from '../src/engine/errors';
import { setDebugTags, takeDebug } from '../src/utils/debug';

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  console.log(USAGE);
  process.exit(0);
}

try {
  const options = parseCliArgs(args, process.env);
  setDebugTags(options.debugTags);
  console.log(renderFixture(resolveFixture(options), options));
} catch (e) {
  if (e instanceof CliError || e instanceof RecipeError || isWindingError(e)) {
    console.error(`${e.name}: ${e.message}`);
    if (e instanceof CliError) console.error(`\n${USAGE}`);
    process.exitCode = 1;
  } else {
    throw e;
  }
} finally {
  const log = takeDebug();
  if (log) console.error(log);
}
