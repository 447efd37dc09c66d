#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { cliParser } from '../lib/cli';
import { build } from '../lib/commands/build';
import { graph } from '../lib/commands/graph';
import { exitStatusOf } from '../lib/errors';
import { SimpleError } from '../lib/util/flow';
import { error, markStartTime, setVerbose } from '../lib/util/log';

async function main() {
  const argv = cliParser(hideBin(process.argv))
    .parseSync();

  setVerbose(argv.verbose > 0);
  markStartTime();

  const options = { projectFile: argv.config, debug: !argv.release };
  const cmd = argv._[0];
  switch (cmd) {
    case 'build':
      await build(options);
      break;
    case 'graph':
      await graph({ ...options, output: typeof argv.output === 'string' ? argv.output : undefined });
      break;
    default:
      throw new SimpleError(`Unknown command: ${cmd}`);
  }
}

main().catch(e => {
  if (e instanceof SimpleError) {
    error(e.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
  }
  process.exitCode = exitStatusOf(e);
});
