export { parse_edn, node_text } from './parse-edn';
export { read_edn, decode_node, decode_string } from './read-value';
export { print_edn } from './print-edn';
export { to_plain, plain_key, set_own } from './to-plain';
