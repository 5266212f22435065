import { Command, Option } from 'commander';
import { resolve } from 'node:path';
import { DEFAULT_CALL_FORM } from '../config';
import { print_edn } from '../reader';
import { get_path_in_file } from '../resolver';
import { compiler_options_schema, project_schema } from '../schema';
import { format_issue, validate_file } from '../validator';
import { parse_segment, segment_name } from '../utils/segment.util';

type GlobalOptions = {
  callForm: string;
};

type CheckOptions = {
  schema: 'project' | 'compiler';
};

const SCHEMAS = {
  project: project_schema,
  compiler: compiler_options_schema,
};

/** 构建 CLI；index.ts 负责真正解析 argv（测试里可单独构建、注入 argv） */
export function create_program(): Command {
  const program = new Command();

  program
    .name('edn-locate')
    .description('Locate paths in EDN / project.clj files and validate them with file:line:column diagnostics')
    .version('0.1.0')
    .option('--call-form <name>', 'head symbol of the top-level call form', DEFAULT_CALL_FORM);

  program
    .command('locate')
    .description('print the location of a path, e.g. locate project.clj :cljsbuild :builds 0')
    .argument('<file>', 'EDN file or project.clj')
    .argument('<segments...>', 'path segments (:keyword, index, or name)')
    .action((file: string, segments: string[]) => {
      const { callForm } = program.opts<GlobalOptions>();
      const path = segments.map(parse_segment);
      const loc = get_path_in_file(path, resolve(file), { call_form: callForm });
      if (!loc) {
        console.error(`❌ Path not found: ${segments.join(' ')} in ${file}`);
        process.exitCode = 1;
        return;
      }
      const out = {
        file: loc.file,
        line: loc.line,
        column: loc.column,
        at: loc.at,
        value: loc.value === undefined ? null : print_edn(loc.value),
        path: path.map(segment_name),
      };
      console.log(JSON.stringify(out, null, 2));
    });

  program
    .command('check')
    .description('validate a configuration file against a schema')
    .argument('<file>', 'EDN file or project.clj')
    .addOption(new Option('--schema <name>', 'schema to validate against').choices(['project', 'compiler']).default('project'))
    .action(async (file: string, opts: CheckOptions) => {
      const { callForm } = program.opts<GlobalOptions>();
      const target = resolve(file);
      console.log(`Checking: ${target}`);

      const result = await validate_file(target, { schema: SCHEMAS[opts.schema], call_form: callForm });
      if (!result.ok) {
        console.error(`❌ ${result.errors.length} problem(s) found:`);
        for (const e of result.errors) {
          console.error(`  - ${format_issue(e)}`);
          if (e.hint) console.error(`      ${e.hint.split('\n')[0]}`);
        }
        process.exitCode = 1;
        return;
      }
      console.log(`✅ No problems found in ${target} (${result.time_ms} ms)`);
    });

  return program;
}
