export * from './artifacts';
export * from './dependency-graph';
export * from './errors';
export * from './project';
export * from './project-schema';
export * from './toolchain';
export * from './visitors/build-visitor';
export * from './visitors/graphviz-visitor';
export { BuildCommand, ICommandRunner, ShellCommandRunner } from './util/shell';
export { SimpleError } from './util/flow';
