import * as fs from 'fs';
import { build } from '../lib/commands/build';
import { graph } from '../lib/commands/graph';
import { SourceNotFoundError } from '../lib/errors';
import { findProjectFile, loadProject, parseProjectJson } from '../lib/project';
import { SimpleError } from '../lib/util/flow';
import { FakeRunner, TestProject } from './fixtures';

const PROJECT_JSON = {
  toolchain: { cc: 'cc', cflags: ['-Iinclude'] },
  targets: [
    { type: 'static-library', name: 'libstr.a', objects: ['str.o'] },
    { type: 'executable', name: 'test_str', dependencies: ['test_str.c', 'str.o'] },
  ],
};

describe('parseProjectJson', () => {
  test('accepts a complete project', () => {
    const parsed = parseProjectJson({
      ...PROJECT_JSON,
      layout: { sourceDir: 'lib' },
    }, 'cbuild.json');

    expect(parsed).toEqual({
      layout: { sourceDir: 'lib' },
      toolchain: { cc: 'cc', cflags: ['-Iinclude'] },
      targets: PROJECT_JSON.targets,
    });
  });

  test('empty target names are rejected', () => {
    expect(() => parseProjectJson({ targets: [{ type: 'executable', name: '', dependencies: [] }] }, 'cbuild.json'))
      .toThrow(new SimpleError('cbuild.json: targets[0].name: must be a non-empty string'));
  });

  test.each([
    [[], /^cbuild\.json: [^:]+$/],
    [{}, /^cbuild\.json: targets: /],
    [{ targets: [{ type: 'program', name: 'x' }] }, /^cbuild\.json: targets\[0\]\.type: /],
    [{ targets: [{ type: 'static-library', name: 'a', objects: ['a.o', 3] }] }, /^cbuild\.json: targets\[0\]\.objects\[1\]: /],
    [{ targets: [], layout: { binDir: 1 } }, /^cbuild\.json: layout\.binDir: /],
    [{ targets: [], toolchain: { cc: ['gcc'] } }, /^cbuild\.json: toolchain\.cc: /],
  ])('rejects %j naming the field', (doc, message) => {
    expect(() => parseProjectJson(doc, 'cbuild.json')).toThrow(message);
  });

  test('validation failures are user errors', () => {
    expect(() => parseProjectJson({}, 'cbuild.json')).toThrow(SimpleError);
  });
});

describe('with a project on disk', () => {
  let project: TestProject;
  let projectFile: string;

  beforeEach(() => {
    project = TestProject.create();
    project.touch('src/str.c', 1000);
    project.touch('test/test_str.c', 1000);
    projectFile = project.path('cbuild.json');
    fs.writeFileSync(projectFile, JSON.stringify(PROJECT_JSON), { encoding: 'utf-8' });
  });

  afterEach(() => {
    project.cleanup();
  });

  test('project file is found upwards', async () => {
    expect(await findProjectFile(project.path('src'))).toEqual(projectFile);
  });

  test('loading registers targets in file order', async () => {
    const { graph: g } = await loadProject({ projectFile });

    expect(g.roots.map(r => r.path)).toEqual([
      project.path('bin/libstr.a'),
      project.path('test/bin/test_str'),
    ]);
  });

  test('unresolvable names fail while loading', async () => {
    fs.writeFileSync(projectFile, JSON.stringify({
      targets: [{ type: 'shared-library', name: 'libx.so', objects: ['missing.o'] }],
    }), { encoding: 'utf-8' });

    await expect(loadProject({ projectFile })).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  test('build runs the configured toolchain for every stale artifact', async () => {
    // GIVEN
    const runner = new FakeRunner();

    // WHEN
    const rebuilt = await build({ projectFile, debug: false, runner });

    // THEN
    expect(runner.commands.map(c => c.commandLine)).toEqual([
      `cc -O2 -Wall -Iinclude -o ${project.path('obj/rls/str.o')} -c ${project.path('src/str.c')}`,
      `ar rcs ${project.path('bin/libstr.a')} ${project.path('obj/rls/str.o')}`,
      `cc -O2 -Wall -Iinclude -o ${project.path('test/bin/test_str')} ${project.path('test/test_str.c')} ${project.path('obj/rls/str.o')}`,
    ]);
    expect(rebuilt).toHaveLength(3);
  });

  test('second build has nothing to do', async () => {
    await build({ projectFile, runner: new FakeRunner() });
    const runner = new FakeRunner();

    const rebuilt = await build({ projectFile, runner });

    expect(rebuilt).toEqual([]);
    expect(runner.commands).toEqual([]);
  });

  test('graph writes a DOT file', async () => {
    const output = project.path('graph.dot');

    await graph({ projectFile, output });

    expect(fs.readFileSync(output, { encoding: 'utf-8' }).split('\n')).toEqual([
      'digraph {',
      `  str_c [label="${project.path('src/str.c')}"]`,
      `  str_o [label="${project.path('obj/dbg/str.o')}"]`,
      '  str_o -> str_c',
      `  libstr_a [label="${project.path('bin/libstr.a')}"]`,
      '  libstr_a -> str_o',
      `  test_str_c [label="${project.path('test/test_str.c')}"]`,
      `  test_str [label="${project.path('test/bin/test_str')}"]`,
      '  test_str -> test_str_c',
      '  test_str -> str_o',
      '}',
      '',
    ]);
  });
});
