// ─── Archive members (tar) ───

export type ArchiveMemberType = 'file' | 'symlink' | 'link';

export interface ArchiveMember {
  name: string;
  type: ArchiveMemberType;
  mode: number;
  mtime: Date;
  uid: number;
  gid: number;
  uname: string;
  gname: string;
  linkname?: string;
  /** Empty for links. */
  content: Buffer;
}

export interface NormalizeOptions {
  /** Member always sorted first. */
  metadataMember?: string;
  /** Seconds since the epoch. */
  mtime?: number;
  owner?: string;
}
