#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseTargetFormat } from './types/options';
import { Logger } from './utils/Logger';
import { LoopPipelineConverter } from './utils/LoopPipelineConverter';
import { ConversionReportFormatter } from './utils/output/ConversionReportFormatter';
import { applyRewriteEdits } from './utils/output/EditApplier';
import { LoopModelFormatter } from './utils/output/LoopModelFormatter';
import { MethodSourceParser } from './utils/parsers/MethodSourceParser';
import { SyntaxPrinter } from './utils/syntax/SyntaxPrinter';

interface CliOptions {
  target: string;
  group: boolean;
  merge: boolean;
  toList?: boolean;
  iteratorName: string;
  threadSafetyCheck: boolean;
  visualize?: boolean;
  verbose?: boolean;
  showLogs?: boolean;
  logLevel: string;
  quiet?: boolean;
}

const program = new Command();

// Read version from package.json
const packageJson = z.object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(path.join(__dirname, '../package.json'), 'utf8')));

program
  .name('loop-pipeline')
  .description('Rewrite loops of JSON-encoded method bodies into stream pipelines, or pipelines back into loops')
  .version(packageJson.version)
  .arguments('<method-json>')
  .option('--target <format>', 'Rewrite target (stream, iterator, enhanced-for)', 'stream')
  .option('--no-group', 'Do not merge adjacent loops collecting into the same target')
  .option('--no-merge', 'Do not fold the preceding empty collection declaration into the pipeline')
  .option('--to-list', 'Collect lists with .toList() instead of Collectors.toList()')
  .option('--iterator-name <name>', 'Iterator variable name for iterator loops', 'it')
  .option('--no-thread-safety-check', 'Convert index-based loops over fields without checking the source')
  .option('--visualize', 'Print a diagram of every converted loop model')
  .option('--verbose', 'Write detailed analysis to file')
  .option('--show-logs', 'Show logs in console (default: logs written to file only)')
  .option('--log-level <level>', 'Set the log level (debug, info, warn, error)', 'info')
  .option('--quiet', 'Disable all logging')
  .action((inputPath: string, options: CliOptions) => {
    // Setup logger
    Logger.setLogLevel(Logger.parseLevel(options.logLevel));
    Logger.enableLogs(!options.quiet);
    Logger.enableConsole(Boolean(options.showLogs));
    Logger.info('CLI', 'Starting...');

    try {
      const fullPath = path.resolve(process.cwd(), inputPath);
      if (!fs.existsSync(fullPath) || !fs.lstatSync(fullPath).isFile()) {
        throw new Error(`File not found at: ${fullPath}`);
      }
      const methods = MethodSourceParser.parseJson(fs.readFileSync(fullPath, 'utf-8'));
      Logger.info('CLI', `Read ${methods.length} method(s) from ${fullPath}`);

      const converter = new LoopPipelineConverter({
        targetFormat: parseTargetFormat(options.target),
        groupConsecutiveLoops: options.group,
        mergeDeclarations: options.merge,
        useStreamToList: Boolean(options.toList),
        iteratorVariableName: options.iteratorName,
        checkSourceThreadSafety: options.threadSafetyCheck
      });
      const reports = methods.map(method => ({ method, report: converter.convert(method) }));

      // Write detailed analysis to file
      if (options.verbose) {
        const analysisFile = path.join(process.cwd(), 'loop-analysis-details.json');
        fs.writeFileSync(analysisFile, JSON.stringify(reports.map(entry => entry.report), null, 2));
        Logger.info('CLI', `Detailed analysis written to ${analysisFile}`);
      }

      const reportFormatter = new ConversionReportFormatter();
      const modelFormatter = new LoopModelFormatter();
      for (const { method, report } of reports) {
        console.log(reportFormatter.format(report));
        if (options.visualize) {
          report.decisions.forEach(decision => {
            if (decision.model) {
              console.log('');
              console.log(modelFormatter.visualize(decision.model));
            }
          });
        }
        console.log('');
        console.log(`--- ${method.name} (rewritten) ---`);
        console.log(SyntaxPrinter.printStatement(applyRewriteEdits(method.body, report.edits)));
        console.log('');
      }
      Logger.info('CLI', 'Done.');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      Logger.error('CLI', 'Conversion failed', error);
      console.error(`Error: ${message}`);
      process.exit(1);
    }
  });

program.parse(process.argv);
