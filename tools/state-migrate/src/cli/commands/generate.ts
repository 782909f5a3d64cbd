import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { createLogger } from '../../logger.js';
import { generateMovedResources, NoAddressesError } from '../logic/generate.js';
import { STDIN_SOURCE } from '../utils/input.js';
import { writeOutput } from '../utils/output.js';

interface GenerateOptions {
  fromFile: string;
  mainRegion?: string;
  templates?: string;
  validateFile?: string;
  output?: string;
  unifiedModule?: string;
  comments: boolean;
  showSkipped?: boolean;
  verbose: boolean;
}

export const generateCommand = new Command('generate')
  .description('Generate moved resource blocks from a legacy state address list')
  .option('--from-file <path>', 'File with legacy state addresses (one per line), - for stdin', STDIN_SOURCE)
  .option('--main-region <region>', 'Main baseline region, e.g. eu-central-1')
  .option('--templates <path>', 'Unified templates: a directory, comma-separated files, or a glob')
  .option('--validate-file <path>', 'File with actual unified state addresses to validate against')
  .option('--unified-module <name>', 'Name of the unified module')
  .option('--no-comments', 'Omit classification comments in output')
  .option('--show-skipped', 'Include skipped data sources as comments in output')
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .option('-v, --verbose', 'Log every generated move', false)
  .action((options: GenerateOptions) => {
    const logger = createLogger(options.verbose);
    try {
      const config = loadConfig();
      const mainRegion = options.mainRegion ?? config.migration.main_region;
      if (!mainRegion) {
        throw new Error('--main-region is required (or set migration.main_region in config)');
      }

      const { output, report, result } = generateMovedResources(
        {
          fromFile: options.fromFile,
          mainRegion,
          templates: options.templates,
          validateFile: options.validateFile,
          unifiedModule: options.unifiedModule ?? config.migration.unified_module,
          templateFiles: config.migration.template_files,
          comments: options.comments && config.output.comments,
          showSkipped: options.showSkipped ?? config.output.show_skipped,
        },
        logger,
      );

      process.stderr.write(report);
      const written = writeOutput(output, options.output);
      if (written) {
        logger.info(`Output written to ${written}`, { moved: result.pairs.length });
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(message);
      process.exit(err instanceof NoAddressesError ? 1 : 2);
    }
  });
