/**
 * @studyforge/vault — Markdown note vault
 *
 * Writes generated artifacts as Markdown notes with YAML frontmatter under
 * `<vaultRoot>/<appDir>/<folder>/`. The orchestration core only depends on
 * the VaultWriter contract: a success flag per write and a writability probe.
 */
import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, stat, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { pino, type BaseLogger } from "pino";

export type NoteFolder = "Quizzes" | "StudyPlans" | "CodeModules" | "general";

export const NOTE_FOLDERS: readonly NoteFolder[] = ["Quizzes", "StudyPlans", "CodeModules", "general"];

const FILE_PREFIX: Record<NoteFolder, string> = {
  Quizzes: "Quiz",
  StudyPlans: "StudyPlan",
  CodeModules: "CodeModule",
  general: "Note",
};

const MAX_SAFE_TITLE_LENGTH = 50;
const MAX_COLLISION_SUFFIX = 99;
const PROBE_FILE_PREFIX = ".write-probe-";

export interface NoteInput {
  title: string;
  body: string;
  /** Where the note should land; unknown hints fall back to "general" */
  folderHint?: NoteFolder | string;
  tags?: string[];
  /** Extra frontmatter fields */
  metadata?: Record<string, string | number | boolean>;
}

export type WriteNoteResult =
  | { success: true; path: string; filename: string; folder: NoteFolder; size: number }
  | { success: false; error: string };

export interface VaultProbe {
  writable: boolean;
  detail?: string;
}

export interface NoteInfo {
  filename: string;
  path: string;
  folder: NoteFolder;
  size: number;
  modified: string;
}

export interface NoteContent extends NoteInfo {
  content: string;
}

export interface VaultWriter {
  writeNote(note: NoteInput): Promise<WriteNoteResult>;
  probe(): Promise<VaultProbe>;
}

export interface FileSystemVaultOptions {
  rootPath: string;
  /** Sub-directory that holds everything this app writes */
  appDir?: string;
  now?: () => Date;
  logger?: BaseLogger;
}

export class FileSystemVault implements VaultWriter {
  readonly rootPath: string;
  readonly appPath: string;
  private readonly now: () => Date;
  private readonly log: BaseLogger;

  constructor(options: FileSystemVaultOptions) {
    this.rootPath = path.resolve(options.rootPath);
    this.appPath = path.join(this.rootPath, options.appDir ?? "StudyForge");
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? pino({ name: "vault", level: process.env["LOG_LEVEL"] ?? "info" });
  }

  async writeNote(note: NoteInput): Promise<WriteNoteResult> {
    const folder = resolveFolder(note.folderHint);
    const created = this.now();
    const dir = this.folderPath(folder);
    const base = `${FILE_PREFIX[folder]}_${safeTitle(note.title)}_${formatStamp(created)}`;
    const content = renderNote(note, folder, created);

    try {
      await mkdir(dir, { recursive: true });
      for (let n = 1; n <= MAX_COLLISION_SUFFIX; n++) {
        const filename = n === 1 ? `${base}.md` : `${base}_${n}.md`;
        const target = path.join(dir, filename);
        try {
          await writeFile(target, content, { encoding: "utf-8", flag: "wx" });
        } catch (err) {
          if (isErrnoException(err) && err.code === "EEXIST") continue;
          throw err;
        }
        this.log.info({ path: target, folder }, "Note written");
        return { success: true, path: target, filename, folder, size: Buffer.byteLength(content, "utf-8") };
      }
      return { success: false, error: `Too many notes named ${base}` };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error({ err, folder }, "Failed to write note");
      return { success: false, error: message };
    }
  }

  /** Creates the app directory if needed, then writes and removes a marker file */
  async probe(): Promise<VaultProbe> {
    const marker = path.join(this.appPath, `${PROBE_FILE_PREFIX}${randomUUID()}`);
    try {
      await mkdir(this.appPath, { recursive: true });
      await writeFile(marker, "probe", { encoding: "utf-8", flag: "wx" });
      await unlink(marker);
      return { writable: true };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { writable: false, detail: message };
    }
  }

  /** Notes in one folder, or in every folder, newest first */
  async listNotes(folder?: NoteFolder): Promise<NoteInfo[]> {
    const folders = folder ? [folder] : NOTE_FOLDERS;
    const notes: NoteInfo[] = [];

    for (const f of folders) {
      const dir = this.folderPath(f);
      let names: string[];
      try {
        names = await readdir(dir);
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") continue;
        throw err;
      }
      for (const name of names) {
        if (!name.endsWith(".md")) continue;
        const full = path.join(dir, name);
        const info = await stat(full);
        if (!info.isFile()) continue;
        notes.push({ filename: name, path: full, folder: f, size: info.size, modified: info.mtime.toISOString() });
      }
    }

    return notes.sort((a, b) => b.modified.localeCompare(a.modified) || a.filename.localeCompare(b.filename));
  }

  /** A note's text; null unless `filename` is a plain .md name that exists in `folder` */
  async readNote(folder: NoteFolder, filename: string): Promise<NoteContent | null> {
    if (!isNoteFilename(filename)) return null;
    const full = path.join(this.folderPath(folder), filename);
    try {
      const info = await stat(full);
      if (!info.isFile()) return null;
      const content = await readFile(full, "utf-8");
      return { filename, path: full, folder, size: info.size, modified: info.mtime.toISOString(), content };
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  private folderPath(folder: NoteFolder): string {
    return folder === "general" ? this.appPath : path.join(this.appPath, folder);
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function resolveFolder(hint: string | undefined): NoteFolder {
  switch (hint) {
    case "Quizzes":
    case "quiz":
      return "Quizzes";
    case "StudyPlans":
    case "study_plan":
      return "StudyPlans";
    case "CodeModules":
    case "code":
      return "CodeModules";
    default:
      return "general";
  }
}

/** A bare "*.md" basename: no directory parts, not hidden */
export function isNoteFilename(name: string): boolean {
  return name.endsWith(".md") && !name.startsWith(".") && !/[\/\\\0]/.test(name);
}

/** Letters, digits, space, "-" and "_"; spaces become underscores */
export function safeTitle(title: string): string {
  const kept = Array.from(title).filter((c) => /[\p{L}\p{N} _-]/u.test(c)).join("").trim();
  const cleaned = kept.replace(/ +/g, "_").slice(0, MAX_SAFE_TITLE_LENGTH);
  return cleaned.length > 0 ? cleaned : "untitled";
}

/** YYYYMMDD_HHMMSS in UTC */
export function formatStamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getUTCFullYear()}${p(d.getUTCMonth() + 1)}${p(d.getUTCDate())}_${p(d.getUTCHours())}${p(d.getUTCMinutes())}${p(d.getUTCSeconds())}`;
}

export function renderNote(note: NoteInput, folder: NoteFolder, created: Date): string {
  const tags = ["studyforge", ...(note.tags ?? [])];
  const lines = [
    "---",
    `title: ${JSON.stringify(note.title)}`,
    `type: ${JSON.stringify(folder)}`,
    `created: ${created.toISOString()}`,
    `tags: [${tags.map((t) => JSON.stringify(t)).join(", ")}]`,
  ];
  for (const [key, value] of Object.entries(note.metadata ?? {})) {
    lines.push(`${key}: ${typeof value === "string" ? JSON.stringify(value) : String(value)}`);
  }
  lines.push("---", "", `# ${note.title}`, "", note.body.trimEnd(), "");
  return lines.join("\n");
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
