/** 路径解析选项 */
export interface ResolveOptions {
  /**
   * 调用形式（call-form）的头部符号：
   * `(defproject my-app "1.0" :dependencies [...])` 这样的顶层列表
   * 在按键查找时被视作“位置参数 + 关键字/值对”。
   */
  call_form: string;
}

export const DEFAULT_CALL_FORM = 'defproject';

export const default_resolve_options: Readonly<ResolveOptions> = {
  call_form: DEFAULT_CALL_FORM,
};

/** 用默认值补齐调用方给的部分选项 */
export function resolve_options(partial?: Partial<ResolveOptions>): ResolveOptions {
  return {
    call_form: partial?.call_form ?? default_resolve_options.call_form,
  };
}
