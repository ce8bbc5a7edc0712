import fsp from "node:fs/promises";
import path from "node:path";
import { pathViolationError } from "./errors.js";

export interface ResolvedPath {
  /** service/folder/stored_filename, always with forward slashes. */
  relativePath: string;
  absolutePath: string;
  absoluteDir: string;
}

const FORBIDDEN = /[\\\0]/;

/** Throws PATH_VIOLATION unless `seg` is a single, non-special path segment. */
export function assertSegment(seg: string, input: string = seg): void {
  if (seg === "" || seg === "." || seg === ".." || seg.includes("/") || FORBIDDEN.test(seg)) {
    throw pathViolationError(input);
  }
}

function splitSegments(value: string): string[] {
  if (FORBIDDEN.test(value) || path.posix.isAbsolute(value) || path.isAbsolute(value)) {
    throw pathViolationError(value);
  }
  const segments = value.replace(/\/+$/, "").split("/");
  for (const seg of segments) assertSegment(seg, value);
  return segments;
}

/**
 * Maps (service, folder, filename) onto the storage root and refuses anything
 * that would land outside it, including through symlinked directories.
 */
export class PathResolver {
  readonly root: string;
  private thumbPrefix: string;
  private realRoot: string | null = null;

  constructor(root: string, thumbPrefix: string) {
    this.root = path.resolve(root);
    this.thumbPrefix = thumbPrefix;
  }

  /** Splits and validates a caller-chosen folder such as "avatars/2024". */
  folderSegments(folder: string): string[] {
    return splitSegments(folder);
  }

  resolve(service: string, folder: string, storedFilename: string): ResolvedPath {
    assertSegment(service);
    assertSegment(storedFilename);
    const segments = [service, ...this.folderSegments(folder), storedFilename];
    const absolutePath = this.confine(segments, segments.join("/"));
    return {
      relativePath: segments.join("/"),
      absolutePath,
      absoluteDir: path.dirname(absolutePath),
    };
  }

  /** Resolves a stored relative file_path, following symlinks to check confinement. */
  async resolveExisting(filePath: string): Promise<string> {
    const segments = splitSegments(filePath);
    const absolutePath = this.confine(segments, filePath);
    await this.assertRealPathInside(absolutePath, filePath);
    return absolutePath;
  }

  /** Relative path of the thumbnail that belongs to a primary file. */
  thumbnailPathFor(relativePath: string): string {
    const dir = path.posix.dirname(relativePath);
    return `${dir}/${this.thumbPrefix}${path.posix.basename(relativePath)}`;
  }

  isThumbnailName(name: string): boolean {
    return name.startsWith(this.thumbPrefix);
  }

  /** Primary file name for a thumbnail name, or null when `name` is not one. */
  primaryNameOf(name: string): string | null {
    return this.isThumbnailName(name) ? name.slice(this.thumbPrefix.length) : null;
  }

  /** mkdir -p, then verify no symlink in the chain points outside the root. */
  async ensureDir(absoluteDir: string): Promise<void> {
    const input = path.relative(this.root, absoluteDir);
    // Checked before and after: mkdir must not follow a link out of the root
    await this.assertRealPathInside(absoluteDir, input);
    await fsp.mkdir(absoluteDir, { recursive: true });
    await this.assertRealPathInside(absoluteDir, input);
  }

  private confine(segments: string[], input: string): string {
    const absolutePath = path.resolve(this.root, ...segments);
    const rel = path.relative(this.root, absolutePath);
    if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw pathViolationError(input);
    }
    return absolutePath;
  }

  private async assertRealPathInside(target: string, input: string): Promise<void> {
    const realRoot = await this.getRealRoot();
    const real = await realPathOfNearest(target);
    const rel = path.relative(realRoot, real);
    if (rel.startsWith("..") || path.isAbsolute(rel)) {
      throw pathViolationError(input);
    }
  }

  private async getRealRoot(): Promise<string> {
    if (this.realRoot === null) {
      this.realRoot = await realPathOfNearest(this.root);
    }
    return this.realRoot;
  }
}

/** realpath of `p`, or of its nearest existing ancestor joined with the rest. */
async function realPathOfNearest(p: string): Promise<string> {
  let current = p;
  const rest: string[] = [];
  for (;;) {
    try {
      const real = await fsp.realpath(current);
      return path.join(real, ...rest.reverse());
    } catch (err) {
      if (!isErrnoCode(err, "ENOENT")) throw err;
      const parent = path.dirname(current);
      if (parent === current) return p;
      rest.push(path.basename(current));
      current = parent;
    }
  }
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
