export const jpgExtension = ".jpg";

/** 識別碼比對時忽略的尾碼位數 */
export const identifierDropLength = 5;

/** 輸出檔名中序號補零的寬度 */
export const indexPadWidth = 4;
