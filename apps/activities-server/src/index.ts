/**
 * Activity Directory Server - Entry Point
 *
 * Runs the server with this app's static/ directory as the default page root.
 */

import { fileURLToPath } from 'node:url';
import { run } from '@mergington/server';

await run(process.argv.slice(2), {
  staticDir: fileURLToPath(new URL('../static', import.meta.url)),
});
