import {
  ArtifactVisitor, ExecutableArtifact, ObjectArtifact, SharedLibraryArtifact,
  SourceArtifact, StaticLibraryArtifact,
} from '../lib/artifacts';

class RecordingVisitor implements ArtifactVisitor {
  public readonly visits = new Array<string>();

  public visitSource(source: SourceArtifact) { this.visits.push(`source ${source.path}`); }
  public visitObject(obj: ObjectArtifact) { this.visits.push(`object ${obj.path}`); }
  public visitStaticLibrary(lib: StaticLibraryArtifact) { this.visits.push(`static ${lib.path}`); }
  public visitSharedLibrary(lib: SharedLibraryArtifact) { this.visits.push(`shared ${lib.path}`); }

  public async visitExecutable(exe: ExecutableArtifact) {
    await Promise.resolve();
    this.visits.push(`executable ${exe.path}`);
  }
}

const fooC = new SourceArtifact('/p/src/foo.c');
const barC = new SourceArtifact('/p/src/bar.c');
const fooO = new ObjectArtifact('/p/obj/dbg/foo.o', fooC);
const barO = new ObjectArtifact('/p/obj/dbg/bar.o', barC);

test('dependencies are returned in declaration order', () => {
  const lib = new StaticLibraryArtifact('/p/bin/libfb.a', [fooO, barO]);
  const exe = new ExecutableArtifact('/p/test/bin/t', [barC, fooO]);

  expect(fooC.dependencies()).toEqual([]);
  expect(fooO.dependencies()).toEqual([fooC]);
  expect(lib.dependencies()).toEqual([fooO, barO]);
  expect(exe.dependencies()).toEqual([barC, fooO]);
});

test('dependencies are stable across calls and cannot be changed', () => {
  // GIVEN
  const objects = [fooO, barO];
  const lib = new SharedLibraryArtifact('/p/bin/libfb.so', objects);

  // WHEN
  objects.push(new ObjectArtifact('/p/obj/dbg/baz.o', new SourceArtifact('/p/src/baz.c')));

  // THEN
  expect(lib.dependencies()).toBe(lib.dependencies());
  expect(lib.dependencies().map(d => d.path)).toEqual(['/p/obj/dbg/foo.o', '/p/obj/dbg/bar.o']);
  expect(Object.isFrozen(lib.dependencies())).toBe(true);
});

test('artifacts with the same path are equal', () => {
  const other = new SourceArtifact('/p/src/foo.c');

  expect(other.equals(fooC)).toBe(true);
  expect(other).not.toBe(fooC);
  expect(fooC.equals(barC)).toBe(false);
  expect(fooC.key).toEqual('/p/src/foo.c');
  expect(`${fooO}`).toEqual('/p/obj/dbg/foo.o');
});

test('accept visits dependencies before the artifact itself', async () => {
  // GIVEN
  const lib = new StaticLibraryArtifact('/p/bin/libfb.a', [fooO, barO]);
  const visitor = new RecordingVisitor();

  // WHEN
  await lib.accept(visitor);

  // THEN
  expect(visitor.visits).toEqual([
    'source /p/src/foo.c',
    'object /p/obj/dbg/foo.o',
    'source /p/src/bar.c',
    'object /p/obj/dbg/bar.o',
    'static /p/bin/libfb.a',
  ]);
});

test('each library kind dispatches to its own visit operation', async () => {
  const visitor = new RecordingVisitor();

  await new SharedLibraryArtifact('/p/bin/libf.so', []).accept(visitor);
  await new StaticLibraryArtifact('/p/bin/libf.a', []).accept(visitor);

  expect(visitor.visits).toEqual([
    'shared /p/bin/libf.so',
    'static /p/bin/libf.a',
  ]);
});

test('accept does not deduplicate shared dependencies', async () => {
  // GIVEN
  const exe = new ExecutableArtifact('/p/test/bin/t', [fooO, new ObjectArtifact('/p/obj/dbg/foo2.o', fooC)]);
  const visitor = new RecordingVisitor();

  // WHEN
  await exe.accept(visitor);

  // THEN
  expect(visitor.visits).toEqual([
    'source /p/src/foo.c',
    'object /p/obj/dbg/foo.o',
    'source /p/src/foo.c',
    'object /p/obj/dbg/foo2.o',
    'executable /p/test/bin/t',
  ]);
});
