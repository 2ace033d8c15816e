import { readFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { AppContainer } from '../infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../infrastructure/config/Config.js';
import { startServer } from '../server.js';

const parseStdDevMode = (value: string): 'sample' | 'population' => {
  if (value === 'sample' || value === 'population') {
    return value;
  }

  throw new InvalidArgumentError('expected "sample" or "population"');
};

const parseSigma = (value: string): number => {
  const sigma = Number(value);

  if (!Number.isFinite(sigma) || sigma <= 0) {
    throw new InvalidArgumentError('expected a positive number');
  }

  return sigma;
};

interface RunCommandOptions {
  input: string;
  stddev?: 'sample' | 'population';
  sigma?: number;
}

export const runBatch = async (options: RunCommandOptions, log: (line: string) => void = console.log) => {
  const config = loadConfig();
  const container = new AppContainer({
    config: {
      ...config,
      pipeline: {
        stdDevMode: options.stddev ?? config.pipeline.stdDevMode,
        outlierSigma: options.sigma ?? config.pipeline.outlierSigma,
      },
    },
  });

  const contents = await readFile(options.input, 'utf-8');
  await container.rawIngestion.load(JSON.parse(contents));

  const result = await container.pipelineService.run();
  const counts = await container.reportingService.counts();
  const months = await container.reportingService.monthlyKpis();

  log(result.summary.description);
  log(JSON.stringify({ counts, statistics: result.statistics, months }, null, 2));

  return result;
};

export const buildProgram = (): Command => {
  const program = new Command();

  program
    .name('procurement-pipeline')
    .description('Validate, normalize and classify procurement transactions into a fact table')
    .version('0.1.0');

  program
    .command('run')
    .description('Run one full-refresh pipeline over a JSON file of raw transactions')
    .requiredOption('-i, --input <file>', 'JSON array of raw transaction rows')
    .option('--stddev <mode>', 'standard deviation mode: sample or population', parseStdDevMode)
    .option('--sigma <number>', 'outlier threshold in standard deviations', parseSigma)
    .action(async (options: RunCommandOptions) => {
      await runBatch(options);
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .action(() => {
      startServer();
    });

  return program;
};
