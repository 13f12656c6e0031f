import { chmod, copyFile, stat, utimes } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type { CopyError, FileCopier } from "./FileCopier";

export class FileCopierDefault implements FileCopier {
  async copy(from: string, to: string): Promise<Result<null, CopyError>> {
    try {
      await copyFile(from, to);
      const info = await stat(from);
      await chmod(to, info.mode & 0o7777);
      await utimes(to, info.atime, info.mtime);
      return ok(null);
    } catch (e) {
      return err({
        type: "COPY_FAILED",
        from,
        to,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
