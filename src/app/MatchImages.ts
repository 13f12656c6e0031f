import type { CAC } from "cac";
import { mkdir } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr } from "~shared/utils/Result";

import { jpgExtension } from "@/constants";
import { CandidateIndexerDefault } from "@/services/CandidateIndexerDefault";
import {
  type CopyError,
  type FileCopier,
  FileCopierDefault,
} from "@/services/FileCopier";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
  type ScanError,
} from "@/services/FileSystemScanner";
import { ImageMatchServiceDefault } from "@/services/ImageMatchServiceDefault";
import type { EmitSummary } from "@/services/MatchEmitter";
import { MatchEmitterDefault } from "@/services/MatchEmitterDefault";
import { expandHome } from "@/utils/helper";

type MatchImagesOptions = {
  dryRun?: boolean;
};

export type MatchImagesInput = {
  source: string;
  folder1: string;
  folder2: string;
  destination: string;
  dryRun?: boolean;
};

export type DestinationError = {
  type: "DESTINATION_FAILED";
  path: string;
  message: string;
};

export type MatchImagesError = ScanError | CopyError | DestinationError;

/**
 * 建立目的地 → 掃描來源 → 建索引 → 配對 → 複製。
 * 來源掃描、目的地建立與複製失敗時回傳 err，其餘逐檔記錄後繼續。
 */
export async function runMatchImages(
  input: MatchImagesInput,
  deps: { logger: Logger; scanner?: FileSystemScanner; copier?: FileCopier }
): Promise<Result<EmitSummary, MatchImagesError>> {
  const { logger } = deps;
  const scanner = deps.scanner ?? new FileSystemScannerDefault();
  const dryRun = input.dryRun ?? false;

  logger.info({
    event: "start",
  })`來源: ${input.source} ｜ 候選: ${input.folder1}, ${input.folder2} → 目的地: ${input.destination}`;

  if (!dryRun) {
    try {
      await mkdir(input.destination, { recursive: true });
    } catch (e) {
      return err({
        type: "DESTINATION_FAILED",
        path: input.destination,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  // 1) 來源清單（非遞迴），失敗即中止
  const sourceRes = await scanner.scan(input.source, {
    recursive: false,
    allowExts: [jpgExtension],
  });
  if (isErr(sourceRes)) return sourceRes;
  logger.info({
    emoji: "🔎",
    count: sourceRes.value.length,
  })`來源掃描完成，共 ${sourceRes.value.length} 個 JPG`;

  // 2) 候選索引（遞迴）
  const indexer = new CandidateIndexerDefault({ scanner, logger });
  const folder1Index = await indexer.build(input.folder1);
  const folder2Index = await indexer.build(input.folder2);
  logger.info({
    emoji: "📚",
    folder1: folder1Index.size,
    folder2: folder2Index.size,
  })`候選索引建立完成`;

  // 3) 配對
  const plan = new ImageMatchServiceDefault().plan({
    sourceFolder: input.source,
    sourcePaths: sourceRes.value,
    folder1: folder1Index,
    folder2: folder2Index,
  });

  // 4) 複製
  const emitter = new MatchEmitterDefault({
    copier: deps.copier ?? new FileCopierDefault(),
    logger,
  });
  return emitter.emit(plan, input.destination, { dryRun });
}

export function registerMatchImages(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "<source> <folder1> <folder2> <destination>",
      "依識別碼（檔名數字去掉末 5 碼）配對三個資料夾的 JPG，並依來源順序複製到目的地"
    )
    .alias("match")
    .option("--dry-run", "只列出配對結果，不建立目錄也不複製", {
      default: false,
    })
    .action(
      async (
        source: string,
        folder1: string,
        folder2: string,
        destination: string,
        options: MatchImagesOptions
      ) => {
        const logger = baseLogger.extend("match", { emoji: "🧩" });
        const result = await runMatchImages(
          {
            source: expandHome(source),
            folder1: expandHome(folder1),
            folder2: expandHome(folder2),
            destination: expandHome(destination),
            dryRun: options.dryRun ?? false,
          },
          { logger }
        );
        if (isErr(result)) {
          const error = result.error;
          switch (error.type) {
            case "SCAN_FAILED":
              logger.error({ emoji: "❌", error })`掃描來源目錄失敗`;
              break;
            case "DESTINATION_FAILED":
              logger.error({ emoji: "❌", error })`無法建立目的地 ${error.path}`;
              break;
            case "COPY_FAILED":
              logger.error({
                emoji: "🧨",
                error,
              })`複製 ${error.from} 失敗，停止處理`;
              break;
          }
          process.exit(1);
        }
      }
    );
}
