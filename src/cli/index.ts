#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { setLogLevel } from '../shared/logger.js';
import { loadTopicCatalog, selectTopics } from '../shared/topics.js';
import { resolvePath } from '../shared/utils.js';
import { runHarvest } from '../harvest/run.js';
import { PinterestSource, pinterestOptionsFromConfig } from '../source/pinterest.js';
import { createImageClassifier } from '../safety/classifier.js';
import { runUploadPhase } from '../upload/uploadPhase.js';

const program = new Command();

program
  .name('pinharvest')
  .description('Multi-topic Pinterest pin harvester with image download and safety filtering')
  .version('0.1.0');

interface RunOptions {
  categories?: string;
  maxPins?: string;
  images: boolean;
  upload?: boolean;
  output?: string;
}

function applyRunOptions(config: Config, opts: RunOptions): Config {
  const maxPins = opts.maxPins ? parseInt(opts.maxPins, 10) : NaN;
  return {
    ...config,
    harvest: {
      ...config.harvest,
      categories: opts.categories ?? config.harvest.categories,
      max_pins_per_topic: maxPins > 0 ? maxPins : config.harvest.max_pins_per_topic,
    },
    assets: { ...config.assets, download_images: config.assets.download_images && opts.images },
    output: { ...config.output, root: opts.output ?? config.output.root },
    upload: { ...config.upload, enabled: opts.upload ?? config.upload.enabled },
  };
}

function withInterrupt(): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const onSigint = (): void => {
    log('\nInterrupted, finishing in-flight work...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  return { signal: controller.signal, cleanup: () => process.off('SIGINT', onSigint) };
}

// === run ===
program
  .command('run')
  .description('Harvest pins for the selected categories, download images, and write JSON')
  .option('-c, --categories <list>', 'Comma-separated categories, or ALL')
  .option('-n, --max-pins <n>', 'Max pins per topic')
  .option('-o, --output <dir>', 'Output folder')
  .option('--no-images', 'Skip image downloads')
  .option('--upload', 'Upload the output folder to Drive after the harvest')
  .action(async (opts: RunOptions) => {
    const config = applyRunOptions(await loadConfig(), opts);
    setLogLevel(config.log_level);

    const { signal, cleanup } = withInterrupt();
    try {
      const summary = await runHarvest(config, {
        source: new PinterestSource(pinterestOptionsFromConfig(config.source)),
        signal,
      });
      const { progress, assets } = summary;

      log(`\nHarvest complete (run ${summary.runId}):`);
      log(`  Topics completed:  ${progress.completedTopics}/${progress.totalTopics}`);
      log(`  Topics failed:     ${progress.failedTopics}`);
      log(`  Unique pins:       ${progress.totalAccepted}`);
      log(`  Text filtered:     ${summary.filteredText}`);
      log(`  Duplicates:        ${summary.duplicates}`);
      if (config.assets.download_images) {
        log(`  Images saved:      ${assets.saved}`);
        log(`  Images existing:   ${assets.skippedExisting}`);
        log(`  Images unsafe:     ${assets.filteredUnsafe}`);
        log(`  Images failed:     ${assets.failedFetch}`);
      }
      log(`  Master file:       ${summary.masterPath ?? `not written (${summary.masterError ?? 'unknown error'})`}`);
      log(`  Duration:          ${Math.round(summary.durationMs / 1000)}s`);

      const categories = Object.entries(progress.perCategory);
      if (categories.length > 0) {
        log('\nPins per category:');
        for (const [category, count] of categories.sort((a, b) => b[1] - a[1])) {
          log(`  ${category.padEnd(24)} ${count}`);
        }
      }

      const failures = summary.topics.filter((t) => t.status !== 'succeeded');
      if (failures.length > 0) {
        log('\nFailed topics:');
        for (const t of failures) {
          log(`  ${t.category}/${t.topic}: ${t.status}${t.error ? ` (${t.error})` : ''}`);
        }
      }

      if (!signal.aborted) {
        const upload = await runUploadPhase(config, summary.outputRoot);
        if (upload.status === 'completed') {
          log(`\n✓ Drive upload: ${upload.succeeded} categories ok, ${upload.failed} with failures`);
        } else if (upload.status === 'skipped') {
          log(`\nDrive upload skipped: ${upload.reason}`);
        }
      }
    } catch (err) {
      log(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === topics ===
program
  .command('topics')
  .description('List the topics a run would harvest')
  .option('-c, --categories <list>', 'Comma-separated categories, or ALL')
  .action(async (opts: { categories?: string }) => {
    try {
      const config = await loadConfig();
      const catalog = loadTopicCatalog(config.topics_file || undefined);
      const entries = selectTopics(catalog, opts.categories ?? config.harvest.categories);

      let current = '';
      for (const entry of entries) {
        if (entry.category !== current) {
          current = entry.category;
          log(`\n${current}`);
        }
        log(`  ${entry.topic}`);
      }
      log(`\n${entries.length} topics`);
    } catch (err) {
      log(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

// === upload ===
program
  .command('upload')
  .description('Upload an existing output folder to Drive')
  .option('-o, --output <dir>', 'Output folder')
  .action(async (opts: { output?: string }) => {
    try {
      const loaded = await loadConfig();
      const config: Config = { ...loaded, upload: { ...loaded.upload, enabled: true } };
      setLogLevel(config.log_level);

      const outputRoot = resolvePath(opts.output ?? config.output.root);
      const result = await runUploadPhase(config, outputRoot);
      if (result.status === 'completed') {
        for (const [category, counts] of Object.entries(result.summary)) {
          log(
            `  ${category.padEnd(24)} uploaded ${counts.uploaded}, skipped ${counts.skipped}, failed ${counts.failed}`,
          );
        }
        log(`\n✓ ${result.succeeded} categories ok, ${result.failed} with failures`);
        if (result.failed > 0) process.exitCode = 1;
      } else if (result.status === 'skipped') {
        log(`Upload skipped: ${result.reason}`);
        process.exitCode = 1;
      }
    } catch (err) {
      log(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

// === init ===
program
  .command('init')
  .description('Create pinharvest.config.yaml in the current directory')
  .option('-f, --force', 'Overwrite an existing config file', false)
  .action((opts: { force: boolean }) => {
    const configPath = path.resolve('pinharvest.config.yaml');
    if (fs.existsSync(configPath) && !opts.force) {
      log('✓ pinharvest.config.yaml already exists');
      return;
    }
    writeDefaultConfig(configPath);
    log('✓ pinharvest.config.yaml created');
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, topic catalog, browser, image filter and upload settings')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const catalog = loadTopicCatalog(config.topics_file || undefined);
        const entries = selectTopics(catalog, config.harvest.categories);
        results.push(`Topics: ${entries.length} selected`);
      } catch (err) {
        results.push(`Topics: error (${errorMessage(err)})`);
      }

      const browserPath = config.source.executable_path;
      if (!browserPath) {
        results.push('Browser: default chromium');
      } else {
        results.push(fs.existsSync(browserPath) ? 'Browser: ok' : `Browser: missing (${browserPath})`);
      }

      try {
        const classifier = createImageClassifier(config.image_filter);
        results.push(classifier ? `Image filter: ${classifier.name}` : 'Image filter: disabled');
      } catch (err) {
        results.push(`Image filter: error (${errorMessage(err)})`);
      }

      if (!config.upload.enabled) {
        results.push('Upload: disabled');
      } else if (!config.upload.drive_folder_url) {
        results.push('Upload: missing folder URL');
      } else if (config.upload.access_token || fs.existsSync(resolvePath(config.upload.credentials_path))) {
        results.push('Upload: configured');
      } else {
        results.push('Upload: missing credentials');
      }
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(`✓ ${results.join(' | ')}`);
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
