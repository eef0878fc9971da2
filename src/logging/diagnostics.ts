import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { WorkflowResult } from '../types/index.js';

/**
 * Per-run artifact directory: failure screenshots and a results.jsonl with one
 * line per finished site.
 */
export class DiagnosticsRecorder {
  private resultsPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.resultsPath = join(runDir, 'results.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logResult(result: WorkflowResult): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...result,
    };
    await appendFile(this.resultsPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /** Returns the written file path. */
  async saveScreenshot(name: string, buffer: Buffer): Promise<string> {
    await this.ensureDir();
    const filePath = join(this.runDir, `${sanitizeName(name)}-${Date.now()}.png`);
    await writeFile(filePath, buffer);
    return filePath;
  }

  getRunDir(): string {
    return this.runDir;
  }
}

function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]+/g, '-');
}
