/**
 * Auto-Tagger CLI
 *
 * Inspect the supported events, dry-run normalization against a captured
 * event, extract a downloaded CloudTrail log, or run the full pipeline on a
 * trigger payload. Output is always JSON.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { createBatchExtractor, createS3LogSource } from '../batch-extraction/index.js';
import { createEventNormalizer, getEventSchema, getSupportedEvents } from '../event-normalization/index.js';
import {
  SERVICE_VERSION,
  UNSUPPORTED_EVENT_MESSAGE,
  additionalTagsFor,
  createTaggingPipeline,
  type TaggingPipeline,
} from '../pipeline/tagging-pipeline.js';
import { loadConfig, type TaggerConfig } from '../runtime/config.js';
import { TelemetryEmitter } from '../runtime/telemetry.js';
import { buildTagSet } from '../tagging/index.js';

/**
 * CLI output format
 */
interface CLIOutput {
  success: boolean;
  command: string;
  result?: unknown;
  error?: {
    code: string;
    message: string;
  };
  timestamp: string;
}

export type OutputWriter = (text: string) => void;

/**
 * Builds the pipeline behind `tag`
 */
export type PipelineFactory = (config: TaggerConfig, telemetry: TelemetryEmitter) => TaggingPipeline;

const awsPipeline: PipelineFactory = (config, telemetry) =>
  createTaggingPipeline({
    config,
    logSource: createS3LogSource(config.defaultRegion),
    telemetry,
  });

function readJsonFile(file: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(file), 'utf8'));
}

/**
 * Logs go to stderr so stdout stays machine-readable
 */
function cliTelemetry(): TelemetryEmitter {
  return new TelemetryEmitter({
    component: 'auto-tagger-cli',
    version: SERVICE_VERSION,
    logLevel: 'error',
    destination: process.stderr,
  });
}

/**
 * Create the CLI program
 */
export function createProgram(
  write: OutputWriter = (text) => console.log(text),
  createPipeline: PipelineFactory = awsPipeline
): Command {
  const program = new Command();

  const printOutput = (output: CLIOutput): void => {
    write(JSON.stringify(output, null, 2));
  };

  const fail = (command: string, error: unknown): void => {
    printOutput({
      success: false,
      command,
      error: {
        code: 'CLI_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error',
      },
      timestamp: new Date().toISOString(),
    });
    process.exitCode = 1;
  };

  program
    .name('auto-tagger')
    .description('Tag newly created AWS resources with their creator')
    .version(SERVICE_VERSION);

  program
    .command('events')
    .description('List the CloudTrail creation events that are tagged')
    .action(() => {
      const events = getSupportedEvents().map((eventName) => {
        const schema = getEventSchema(eventName);
        return {
          event_name: eventName,
          service: schema?.service,
          resource_kind: schema?.resourceKind,
        };
      });

      printOutput({
        success: true,
        command: 'events',
        result: events,
        timestamp: new Date().toISOString(),
      });
    });

  program
    .command('normalize')
    .description('Show the creation fact and tag set for a captured EventBridge event')
    .requiredOption('-e, --event <path>', 'Path to the event JSON file')
    .action((options: { event: string }) => {
      try {
        const config = loadConfig();
        const fact = createEventNormalizer(cliTelemetry()).normalize(readJsonFile(options.event));

        if (!fact) {
          printOutput({
            success: false,
            command: 'normalize',
            error: { code: 'UNSUPPORTED_EVENT', message: UNSUPPORTED_EVENT_MESSAGE },
            timestamp: new Date().toISOString(),
          });
          process.exitCode = 1;
          return;
        }

        printOutput({
          success: true,
          command: 'normalize',
          result: {
            fact,
            tags: buildTagSet(fact.actorIdentity, additionalTagsFor(config, fact)),
          },
          timestamp: new Date().toISOString(),
        });
      } catch (error) {
        fail('normalize', error);
      }
    });

  program
    .command('extract')
    .description('Extract taggable events from a CloudTrail log file (gzipped or plain JSON)')
    .requiredOption('-f, --file <path>', 'Path to the log file')
    .action((options: { file: string }) => {
      try {
        const bytes = fs.readFileSync(path.resolve(options.file));
        const events = createBatchExtractor(cliTelemetry()).extract(bytes);

        printOutput({
          success: true,
          command: 'extract',
          result: { count: events.length, events },
          timestamp: new Date().toISOString(),
        });
      } catch (error) {
        fail('extract', error);
      }
    });

  program
    .command('tag')
    .description('Run the tagging pipeline on a trigger payload against AWS')
    .requiredOption('-e, --event <path>', 'Path to the trigger payload JSON file')
    .option('--region <region>', 'Region for events that carry none')
    .action(async (options: { event: string; region?: string }) => {
      try {
        const loaded = loadConfig();
        const config = { ...loaded, defaultRegion: options.region ?? loaded.defaultRegion };
        const pipeline = createPipeline(config, cliTelemetry());

        const response = await pipeline.handle(readJsonFile(options.event));
        const body: unknown = JSON.parse(response.body);

        printOutput({
          success: response.statusCode === 200,
          command: 'tag',
          result: { status_code: response.statusCode, body },
          timestamp: new Date().toISOString(),
        });
        if (response.statusCode !== 200) {
          process.exitCode = 1;
        }
      } catch (error) {
        fail('tag', error);
      }
    });

  return program;
}
