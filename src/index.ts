export { get_path_in_file, get_path_in_text, resolve_path, line_number, column_number, extract_value, initial_position } from './resolver';
export { parse_edn, node_text, read_edn, print_edn, to_plain } from './reader';
export { root_cursor, up, down, left, right, next } from './cursor';
export type { Cursor, Step } from './cursor';
export { validate_text, validate_file, format_issue } from './validator';
export { compiler_options_schema, project_schema, build_schema, key_docs, doc_for_key } from './schema';
export { default_resolve_options, DEFAULT_CALL_FORM } from './config';
export type { ResolveOptions } from './config';
export { EdnParseError, PathContractError } from './errors';
export { kw, sym, parse_segment, to_pointer } from './utils/segment.util';
export { NodeKind } from './types';
export type * from './types';
