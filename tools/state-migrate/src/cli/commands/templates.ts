import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { describeTemplates } from '../logic/templates.js';
import { writeOutput } from '../utils/output.js';

export const templatesCommand = new Command('templates')
  .description('Show the repetition mode detected for each resource in the unified templates')
  .requiredOption('--templates <path>', 'Unified templates: a directory, comma-separated files, or a glob')
  .option('--pretty', 'Pretty-print JSON output', false)
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .action((options: { templates: string; pretty: boolean; output?: string }) => {
    try {
      const config = loadConfig();
      const result = describeTemplates(options.templates, config.migration.template_files);

      const indent = options.pretty ? 2 : undefined;
      const written = writeOutput(JSON.stringify(result, null, indent) + '\n', options.output);
      if (written) {
        process.stderr.write(`Written to ${written}\n`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Error: ${message}\n`);
      process.exit(2);
    }
  });
