import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { Headers } from 'tar-stream';
import { extract as tarExtract, pack as tarPack } from 'tar-stream';
import { ArchiveMember, ArchiveMemberType, DistributionManifest, NormalizeOptions } from '../types/index.js';
import { IntegrityError } from './errors.js';
import { serializeManifest } from './manifest-builder.js';

export const DEFAULT_METADATA_MEMBER = 'python/PYTHON.json';
/** 2024-01-01T00:00:00Z */
export const DEFAULT_MTIME = 1704067200;
export const DEFAULT_OWNER = 'root';

function memberType(headers: Headers): ArchiveMemberType | 'directory' {
  const type = headers.type ?? 'file';
  switch (type) {
    case 'file':
    case 'contiguous-file':
      return 'file';
    case 'symlink':
    case 'link':
    case 'directory':
      return type;
    default:
      throw new IntegrityError(`unsupported tar member type '${type}' for ${headers.name}`);
  }
}

/** Decode an uncompressed tar stream. Directory entries are dropped. */
export async function readArchive(data: Buffer): Promise<ArchiveMember[]> {
  const members: ArchiveMember[] = [];
  let failure: unknown;
  const extract = tarExtract();

  extract.on('entry', (headers: Headers, stream, next) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('error', (err: Error) => {
      failure ??= err;
    });
    stream.on('end', () => {
      try {
        const type = memberType(headers);
        if (type !== 'directory') {
          members.push({
            name: headers.name,
            type,
            mode: headers.mode ?? 0o644,
            mtime: headers.mtime ?? new Date(0),
            uid: headers.uid ?? 0,
            gid: headers.gid ?? 0,
            uname: headers.uname ?? '',
            gname: headers.gname ?? '',
            linkname: headers.linkname ?? undefined,
            content: Buffer.concat(chunks),
          });
        }
      } catch (err) {
        failure ??= err;
      }
      next();
    });
  });

  try {
    await pipeline(Readable.from([data]), extract);
  } catch (err) {
    throw new IntegrityError('archive is not a readable tar stream', err);
  }
  if (failure instanceof IntegrityError) throw failure;
  if (failure !== undefined) {
    throw new IntegrityError('archive member could not be read', failure);
  }
  return members;
}

/** Encode members in the given order. */
export async function encodeArchive(members: readonly ArchiveMember[]): Promise<Buffer> {
  const pack = tarPack();
  const chunks: Buffer[] = [];
  const done = new Promise<Buffer>((resolve, reject) => {
    pack.on('data', (chunk: Buffer) => chunks.push(chunk));
    pack.on('end', () => resolve(Buffer.concat(chunks)));
    pack.on('error', reject);
  });

  for (const member of members) {
    const headers: Headers = {
      name: member.name,
      type: member.type,
      mode: member.mode,
      mtime: member.mtime,
      uid: member.uid,
      gid: member.gid,
      uname: member.uname,
      gname: member.gname,
    };
    if (member.linkname !== undefined) headers.linkname = member.linkname;
    pack.entry(headers, member.type === 'file' ? member.content : Buffer.alloc(0));
  }
  pack.finalize();

  return done;
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Rewrite member headers into canonical form: metadata member first, the rest
 * by path; fixed mtime and owner; mode gains group read/write, and group
 * execute when the owner may execute.
 */
export function canonicalizeMembers(members: readonly ArchiveMember[], options: NormalizeOptions = {}): ArchiveMember[] {
  const metadataMember = options.metadataMember ?? DEFAULT_METADATA_MEMBER;
  const mtime = new Date((options.mtime ?? DEFAULT_MTIME) * 1000);
  const owner = options.owner ?? DEFAULT_OWNER;

  const sorted = [...members].sort((a, b) => {
    if (a.name === metadataMember) return b.name === metadataMember ? 0 : -1;
    if (b.name === metadataMember) return 1;
    return compareNames(a.name, b.name);
  });

  return sorted.map(member => {
    let mode = member.mode | 0o660;
    if (mode & 0o100) mode |= 0o010;
    return {
      ...member,
      mode,
      mtime,
      uid: 0,
      gid: 0,
      uname: owner,
      gname: owner,
    };
  });
}

/**
 * Canonicalize a tar stream so logically identical trees produce identical
 * bytes. Applying it to its own output changes nothing.
 */
export async function normalizeArchive(data: Buffer, options: NormalizeOptions = {}): Promise<Buffer> {
  const members = await readArchive(data);
  return encodeArchive(canonicalizeMembers(members, options));
}

/** Read a directory tree into archive members named `<prefix>/<relative path>`. */
export async function collectDirectory(dir: string, prefix: string): Promise<ArchiveMember[]> {
  const members: ArchiveMember[] = [];

  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      const rel = path.relative(dir, full).split(path.sep).join('/');
      const name = prefix ? `${prefix}/${rel}` : rel;

      if (entry.isDirectory()) {
        await walk(full);
        continue;
      }

      const stat = await fs.lstat(full);
      const base = {
        name,
        mode: stat.mode & 0o7777,
        mtime: stat.mtime,
        uid: stat.uid,
        gid: stat.gid,
        uname: '',
        gname: '',
      };
      if (entry.isSymbolicLink()) {
        members.push({ ...base, type: 'symlink', linkname: await fs.readlink(full), content: Buffer.alloc(0) });
      } else if (entry.isFile()) {
        members.push({ ...base, type: 'file', content: await fs.readFile(full) });
      }
    }
  }

  await walk(dir);
  return members;
}

export async function createArchiveFromDirectory(dir: string, prefix: string): Promise<Buffer> {
  return encodeArchive(await collectDirectory(dir, prefix));
}

export interface PackageOptions extends NormalizeOptions {
  /** Top-level directory of every member. */
  prefix?: string;
}

/**
 * Archive a finished distribution tree with its manifest as the metadata
 * member, in canonical form.
 */
export async function packageDistribution(
  dir: string,
  manifest: DistributionManifest,
  options: PackageOptions = {},
): Promise<Buffer> {
  const metadataMember = options.metadataMember ?? DEFAULT_METADATA_MEMBER;
  const members = (await collectDirectory(dir, options.prefix ?? 'python'))
    .filter(m => m.name !== metadataMember);

  members.push({
    name: metadataMember,
    type: 'file',
    mode: 0o644,
    mtime: new Date(),
    uid: 0,
    gid: 0,
    uname: '',
    gname: '',
    content: Buffer.from(serializeManifest(manifest), 'utf8'),
  });

  return encodeArchive(canonicalizeMembers(members, { ...options, metadataMember }));
}
