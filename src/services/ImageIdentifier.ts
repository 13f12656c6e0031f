import { identifierDropLength } from "@/constants";

/** 副檔名前的連續數字，`.jpg` 區分大小寫 */
const identifierRegex = /(\d+)\.jpg$/;

/**
 * 由檔名取出識別碼：`.jpg` 前的數字去掉最後 5 碼。
 * 數字不超過 5 碼時原樣回傳；無數字或非 `.jpg` 結尾回傳 null。
 *
 * @example
 * extractIdentifier("img00012345.jpg"); // "000"
 * extractIdentifier("cam_1234.jpg"); // "1234"
 * extractIdentifier("IMG00012345.JPG"); // null
 */
export function extractIdentifier(fileName: string): string | null {
  const match = identifierRegex.exec(fileName);
  if (!match) return null;
  const digits = match[1];
  if (digits.length > identifierDropLength) {
    return digits.slice(0, -identifierDropLength);
  }
  return digits;
}
