import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { jpgExtension } from "@/constants";
import { byCodePoint } from "@/utils/helper";

import type { CandidateIndex, CandidateIndexer } from "./CandidateIndexer";
import type { FileSystemScanner } from "./FileSystemScanner";
import { extractIdentifier } from "./ImageIdentifier";

export class CandidateIndexerDefault implements CandidateIndexer {
  private readonly scanner: FileSystemScanner;
  private readonly logger: Logger;

  constructor(deps: { scanner: FileSystemScanner; logger: Logger }) {
    this.scanner = deps.scanner;
    this.logger = deps.logger.extend("CandidateIndexer");
  }

  async build(rootPath: string): Promise<CandidateIndex> {
    const scanRes = await this.scanner.scan(rootPath, {
      recursive: true,
      allowExts: [jpgExtension],
    });
    if (isErr(scanRes)) {
      this.logger.warn({
        root: rootPath,
        error: scanRes.error,
      })`無法掃描 ${rootPath}，視為空目錄`;
      return new Map();
    }

    // readdir 的遞迴順序依平台而定，先排序讓「第一筆」固定
    const paths = [...scanRes.value].sort(byCodePoint);

    const index = new Map<string, string[]>();
    for (const fullPath of paths) {
      const identifier = extractIdentifier(path.basename(fullPath));
      if (identifier === null) continue;
      const list = index.get(identifier);
      if (list) list.push(fullPath);
      else index.set(identifier, [fullPath]);
    }

    this.logger.debug({
      root: rootPath,
      files: paths.length,
      identifiers: index.size,
    })`索引完成`;
    return index;
  }
}
