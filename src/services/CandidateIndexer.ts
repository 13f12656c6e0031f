/** 識別碼 → 檔案完整路徑（依路徑字典序） */
export type CandidateIndex = ReadonlyMap<string, readonly string[]>;

export interface CandidateIndexer {
  /**
   * 遞迴掃描 rootPath 下的 `.jpg`，依識別碼分組。
   * 取不到識別碼的檔案不列入；目錄不存在時回傳空索引。
   */
  build(rootPath: string): Promise<CandidateIndex>;
}
