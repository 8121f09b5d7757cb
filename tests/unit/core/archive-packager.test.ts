import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { pack as tarPack } from 'tar-stream';
import {
  DEFAULT_MTIME,
  canonicalizeMembers,
  collectDirectory,
  encodeArchive,
  normalizeArchive,
  packageDistribution,
  readArchive,
} from '../../../src/core/archive-packager.js';
import { IntegrityError } from '../../../src/core/errors.js';
import { serializeManifest } from '../../../src/core/manifest-builder.js';
import type { ArchiveMember, DistributionManifest } from '../../../src/types/index.js';

function member(name: string, overrides: Partial<ArchiveMember> = {}): ArchiveMember {
  return {
    name,
    type: 'file',
    mode: 0o644,
    mtime: new Date('2023-05-06T07:08:09Z'),
    uid: 1000,
    gid: 1000,
    uname: 'builder',
    gname: 'builder',
    content: Buffer.from(`contents of ${name}\n`),
    ...overrides,
  };
}

const members: ArchiveMember[] = [
  member('python/lib/libpython3.13.a', { mode: 0o644 }),
  member('python/PYTHON.json', { content: Buffer.from('{}\n') }),
  member('python/bin/python3', { mode: 0o755 }),
  member('python/bin/python', { type: 'symlink', linkname: 'python3', content: Buffer.alloc(0), mode: 0o777 }),
];

const manifest: DistributionManifest = {
  version: '8',
  target_triple: 'x86_64-unknown-linux-gnu',
  build_options: 'pgo',
  python_version: '3.13.1',
  python_tag: 'cp313',
  python_flavor: 'cpython',
  python_exe: 'install/bin/python3.13',
  python_include: 'install/include/python3.13',
  python_stdlib: 'install/lib/python3.13',
  object_file_format: 'elf',
  python_extension_module_loading: ['builtin', 'shared-library'],
  build_info: {
    core: { objs: ['build/Python/ceval.o'], links: [{ name: 'm', system: true }] },
    extensions: {},
  },
  crt_features: ['glibc-dynamic'],
  licenses: ['Python-2.0', 'CNRI-Python'],
  license_path: 'licenses/LICENSE.cpython.txt',
};

describe('normalizeArchive', () => {
  it('puts the metadata member first and the rest in path order', async () => {
    const normalized = await readArchive(await normalizeArchive(await encodeArchive(members)));

    expect(normalized.map(m => m.name)).toEqual([
      'python/PYTHON.json',
      'python/bin/python',
      'python/bin/python3',
      'python/lib/libpython3.13.a',
    ]);
  });

  it('fixes owner, mtime and group permissions', async () => {
    const normalized = await readArchive(await normalizeArchive(await encodeArchive(members)));
    const byName = new Map(normalized.map(m => [m.name, m]));

    expect(byName.get('python/bin/python3')?.mode).toBe(0o775);
    expect(byName.get('python/lib/libpython3.13.a')?.mode).toBe(0o664);
    for (const m of normalized) {
      expect(m.mtime.getTime()).toBe(DEFAULT_MTIME * 1000);
      expect([m.uid, m.gid, m.uname, m.gname]).toEqual([0, 0, 'root', 'root']);
    }
    expect(byName.get('python/bin/python')?.linkname).toBe('python3');
    expect(byName.get('python/lib/libpython3.13.a')?.content.toString()).toBe('contents of python/lib/libpython3.13.a\n');
  });

  it('is idempotent', async () => {
    const once = await normalizeArchive(await encodeArchive(members));
    const twice = await normalizeArchive(once);
    expect(twice.equals(once)).toBe(true);
  });

  it('produces identical bytes regardless of member order and header noise', async () => {
    const shuffled = [...members].reverse().map(m => ({
      ...m,
      mtime: new Date('2025-01-02T03:04:05Z'),
      uid: 501,
      gid: 20,
      uname: 'someone',
      gname: 'staff',
    }));

    const a = await normalizeArchive(await encodeArchive(members));
    const b = await normalizeArchive(await encodeArchive(shuffled));
    expect(b.equals(a)).toBe(true);
  });

  it('honours custom metadata member, mtime and owner', async () => {
    const normalized = await readArchive(await normalizeArchive(await encodeArchive(members), {
      metadataMember: 'python/bin/python3',
      mtime: 0,
      owner: 'build',
    }));

    expect(normalized[0].name).toBe('python/bin/python3');
    expect(normalized[0].mtime.getTime()).toBe(0);
    expect(normalized[0].uname).toBe('build');
  });

  it('drops directory entries', async () => {
    const pack = tarPack();
    const chunks: Buffer[] = [];
    pack.on('data', (chunk: Buffer) => chunks.push(chunk));
    const done = new Promise<void>(resolve => pack.on('end', () => resolve()));
    pack.entry({ name: 'python/bin', type: 'directory', mode: 0o755 });
    pack.entry({ name: 'python/bin/python3', mode: 0o755 }, Buffer.from('#!\n'));
    pack.finalize();
    await done;

    const normalized = await readArchive(await normalizeArchive(Buffer.concat(chunks)));
    expect(normalized.map(m => [m.name, m.type])).toEqual([['python/bin/python3', 'file']]);
  });

  it('fails on data that is not a tar stream', async () => {
    await expect(normalizeArchive(Buffer.alloc(1024, 0x41))).rejects.toThrow(IntegrityError);
  });
});

describe('canonicalizeMembers', () => {
  it('adds group execute only when the owner may execute', () => {
    const result = canonicalizeMembers([
      member('a', { mode: 0o700 }),
      member('b', { mode: 0o600 }),
      member('c', { mode: 0o604 }),
    ]);
    expect(result.map(m => m.mode)).toEqual([0o770, 0o660, 0o664]);
  });
});

describe('packageDistribution', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'distkit-package-test-'));
    await fs.mkdir(path.join(tempDir, 'bin'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'lib'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'bin', 'python3'), 'binary\n');
    await fs.chmod(path.join(tempDir, 'bin', 'python3'), 0o755);
    await fs.writeFile(path.join(tempDir, 'lib', 'libpython3.13.a'), 'archive\n');
    await fs.symlink('python3', path.join(tempDir, 'bin', 'python'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('collects files and symlinks under the prefix', async () => {
    const collected = await collectDirectory(tempDir, 'python');
    expect(collected.map(m => [m.name, m.type]).sort()).toEqual([
      ['python/bin/python', 'symlink'],
      ['python/bin/python3', 'file'],
      ['python/lib/libpython3.13.a', 'file'],
    ]);
  });

  it('writes the manifest as the first member', async () => {
    const archive = await readArchive(await packageDistribution(tempDir, manifest));

    expect(archive.map(m => m.name)).toEqual([
      'python/PYTHON.json',
      'python/bin/python',
      'python/bin/python3',
      'python/lib/libpython3.13.a',
    ]);
    expect(archive[0].content.toString('utf8')).toBe(serializeManifest(manifest));
    expect(archive[0].mode).toBe(0o664);
  });

  it('produces the same bytes on every run', async () => {
    const first = await packageDistribution(tempDir, manifest);
    await fs.utimes(path.join(tempDir, 'lib', 'libpython3.13.a'), new Date(0), new Date(0));
    const second = await packageDistribution(tempDir, manifest);

    expect(second.equals(first)).toBe(true);
    expect((await normalizeArchive(first)).equals(first)).toBe(true);
  });
});
