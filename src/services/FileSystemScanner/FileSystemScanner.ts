import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  path: string;
  message: string;
};

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 以檔名結尾比對，不分大小寫；空陣列表示不過濾 */
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
