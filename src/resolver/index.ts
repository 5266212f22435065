export {
  classify_container,
  find_key_in_node,
  find_key_value_in_node,
  resolve_path,
  resolve_hit,
  is_key_position,
  call_form_options,
} from './resolve-path';
export type { Container, Hit } from './resolve-path';
export {
  line_number,
  column_number,
  extract_value,
  initial_position,
  get_path_in_text,
  get_path_in_file,
} from './location';
