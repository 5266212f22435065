/** 源文件中的位置（行列均从 1 开始） */
export interface SourcePoint {
  file: string;
  line: number;
  column: number;
}

/** 结构/领域问题统一表示（校验器使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / UNKNOWN_KEY / PARSE_ERROR）。 */
  code: string;
  /** JSON Pointer 风格路径（如 "/cljsbuild/builds/0/compiler"）。 */
  path: string;
  /** 人类可读消息。 */
  message: string;
  /** 可选：修复建议或文档提示。 */
  hint?: string;
  /** 可选：能定位到源文件时给出；定位失败则缺省（只按路径报告）。 */
  location?: SourcePoint;
}
