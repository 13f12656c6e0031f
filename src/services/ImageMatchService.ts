import type { CandidateFolder, MatchFile } from "@/types";

import type { CandidateIndex } from "./CandidateIndexer";

export interface ImageMatchService {
  /**
   * 依來源檔名排序後逐一比對兩個候選索引，產生每個來源檔的結果。
   * 不做任何檔案操作。
   */
  plan(input: MatchInput): MatchPlan;
}

export interface MatchInput {
  sourceFolder: string;
  /** 來源資料夾內（非遞迴）的 `.jpg` 完整路徑 */
  sourcePaths: readonly string[];
  folder1: CandidateIndex;
  folder2: CandidateIndex;
}

export interface MatchPlan {
  outcomes: MatchOutcome[];
}

/**
 * 一組配對：來源與兩個候選資料夾各一檔，共用同一個序號。
 */
export interface MatchGroup {
  /** 來源清單中的位置，決定輸出檔名順序 */
  index: number;
  identifier: string;
  files: [MatchFile, MatchFile, MatchFile];
}

export type MatchOutcome =
  | {
      type: "MATCHED";
      sourcePath: string;
      group: MatchGroup;
      /** 任一候選資料夾有多筆相同識別碼 */
      ambiguous: boolean;
      candidateCounts: Record<CandidateFolder, number>;
    }
  | {
      type: "NO_IDENTIFIER";
      index: number;
      sourcePath: string;
    }
  | {
      type: "NO_MATCH";
      index: number;
      sourcePath: string;
      identifier: string;
      missingIn: CandidateFolder[];
    };
