import type { ZodTypeAny } from 'zod';
import type { ResolveOptions } from '../config';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  校验阶段（输入 / 诊断 / 输出）
 * ---------------------------*/

/** 校验入口参数 */
export interface ValidateOptions extends Partial<ResolveOptions> {
  /** 报告中使用的文件标识；校验文本时默认 "<text>"。 */
  file?: string;
  /** 用哪张 schema 校验解码后的值；默认 project_schema。 */
  schema?: ZodTypeAny;
}

/** 校验输出 */
export interface ValidateOutput {
  /** 是否通过（errors 为空）。 */
  ok: boolean;
  /** 致命错误列表。 */
  errors: ValidationIssue[];
  /** 非致命告警列表（例如无法定位到源码的问题）。 */
  warnings: ValidationIssue[];
  /** 校验耗时（毫秒）。 */
  time_ms: number;
}
