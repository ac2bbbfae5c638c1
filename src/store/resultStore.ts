import fs from 'node:fs';
import path from 'node:path';
import type { AcceptedRecord } from '../harvest/types.js';
import { toPinJson } from '../harvest/types.js';
import { StoreError, errorMessage } from '../shared/errors.js';
import { topicSlug } from '../shared/utils.js';

export const MASTER_FILE = 'all_pins.json';

export function topicDir(outputRoot: string, category: string, topic: string): string {
  return path.join(outputRoot, category, topicSlug(topic));
}

export function topicJsonPath(outputRoot: string, category: string, topic: string): string {
  return path.join(topicDir(outputRoot, category, topic), `${topicSlug(topic)}_pins.json`);
}

function serialize(records: readonly AcceptedRecord[]): string {
  return JSON.stringify(records.map(toPinJson), null, 2);
}

/**
 * Writes per-topic and master JSON arrays under the output root (UTF-8, 2-space indent).
 */
export class ResultStore {
  constructor(readonly outputRoot: string) {}

  /**
   * Creates the output root and checks it is writable. Fails the run before any harvesting.
   */
  ensureRoot(): void {
    try {
      fs.mkdirSync(this.outputRoot, { recursive: true });
      fs.accessSync(this.outputRoot, fs.constants.W_OK);
    } catch (err) {
      throw new StoreError(`Output root not writable: ${this.outputRoot}`, {
        error: errorMessage(err),
      });
    }
  }

  async writeTopic(category: string, topic: string, records: readonly AcceptedRecord[]): Promise<string> {
    const target = topicJsonPath(this.outputRoot, category, topic);
    await this.write(target, serialize(records));
    return target;
  }

  async writeMaster(records: readonly AcceptedRecord[]): Promise<string> {
    const target = path.join(this.outputRoot, MASTER_FILE);
    await this.write(target, serialize(records));
    return target;
  }

  private async write(target: string, content: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, content, 'utf-8');
    } catch (err) {
      throw new StoreError(`Failed to write ${target}`, { error: errorMessage(err) });
    }
  }
}
