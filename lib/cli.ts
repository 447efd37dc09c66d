import yargs from 'yargs';

/**
 * Command line parser for `cbuild`, not yet run
 */
export function cliParser(args: string[]) {
  return yargs(args)
    .usage('$0 <cmd> [args]')
    .command('build', 'Rebuild all stale targets')
    .command('graph', 'Print the dependency graph in Graphviz DOT format', (y) => y
      .option('output', {
        alias: 'o',
        type: 'string',
        desc: 'Write the graph to this file instead of stdout',
        requiresArg: true,
      }))
    .demandCommand(1, 'Specify a command')
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      desc: 'Increase logging verbosity',
      count: true,
      default: 0,
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      desc: 'Project file (found upwards from the current directory)',
      requiresArg: true,
    })
    .option('release', {
      type: 'boolean',
      desc: 'Build with release instead of debug settings',
      default: false,
    })
    .help()
    .strict()
    .showHelpOnFail(false);
}
