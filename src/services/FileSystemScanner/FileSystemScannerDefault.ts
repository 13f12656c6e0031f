import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export type ScannerFs = {
  readdir(dirPath: string): Promise<Dirent[]>;
  isFileTarget(filePath: string): Promise<boolean>;
};

const nodeFs: ScannerFs = {
  readdir: (dirPath) => readdir(dirPath, { withFileTypes: true }),
  async isFileTarget(filePath) {
    try {
      return (await stat(filePath)).isFile();
    } catch {
      // 斷掉的連結不列入
      return false;
    }
  },
};

export class FileSystemScannerDefault implements FileSystemScanner {
  constructor(private readonly fs: ScannerFs = nodeFs) {}

  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const isRecursive = options?.recursive ?? true;
    const lowerExts = (options?.allowExts ?? []).map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowed = (name: string) => {
      if (lowerExts.length === 0) return true;
      // 比對檔名結尾而非 extname，".jpg" 這類點檔也算在內
      const lower = name.toLowerCase();
      return lowerExts.some((ext) => lower.endsWith(ext));
    };

    let rootEntries: Dirent[];
    try {
      rootEntries = await this.fs.readdir(rootPath);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        path: rootPath,
        message: e instanceof Error ? e.message : String(e),
      });
    }

    // 逐層走訪；根目錄以下讀不到的子目錄略過，其餘照常列出
    const fullPaths: string[] = [];
    const pending: Array<{ dir: string; entries: Dirent[] }> = [
      { dir: rootPath, entries: rootEntries },
    ];
    for (let level = pending.shift(); level; level = pending.shift()) {
      for (const d of level.entries) {
        const fullPath = path.join(level.dir, d.name);
        if (d.isDirectory()) {
          if (!isRecursive) continue;
          const entries = await this.readSubdir(fullPath);
          if (entries) pending.push({ dir: fullPath, entries });
          continue;
        }
        if (!allowed(d.name)) continue;
        if (d.isFile()) {
          fullPaths.push(fullPath);
        } else if (
          d.isSymbolicLink() &&
          (await this.fs.isFileTarget(fullPath))
        ) {
          // 指向檔案的連結照常列出（複製時取連結目標），指向目錄的不走訪
          fullPaths.push(fullPath);
        }
      }
    }
    return ok(fullPaths);
  }

  private async readSubdir(dirPath: string): Promise<Dirent[] | null> {
    try {
      return await this.fs.readdir(dirPath);
    } catch {
      return null;
    }
  }
}
