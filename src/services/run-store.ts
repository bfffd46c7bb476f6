// src/services/run-store.ts: flat-file outputs of a run
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { FanOutRunRecord } from '../types/fanout';

/** Filesystem-safe timestamp, e.g. 2026-10-19T14-03-22. */
export function runStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, '').replace(/:/g, '-');
}

export class RunStore {
  constructor(
    private readonly outputDir: string,
    private readonly stamp: string,
  ) {}

  private file(prefix: string, ext: string): string {
    return path.join(this.outputDir, `${prefix}-${this.stamp}.${ext}`);
  }

  private async write(file: string, content: string): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(file, content, 'utf-8');
    return file;
  }

  saveRecord(record: FanOutRunRecord, costs: unknown): Promise<string> {
    return this.write(this.file('fan-out-data', 'json'), `${JSON.stringify({ ...record, costs }, null, 2)}\n`);
  }

  savePlan(plan: string): Promise<string> {
    return this.write(this.file('content-plan', 'md'), plan);
  }

  saveCostSummary(summary: string): Promise<string> {
    return this.write(this.file('costs', 'txt'), `${summary}\n`);
  }
}
