import fs from 'fs/promises';
import path from 'path';
import type { CapturedPayload } from './types.js';

export interface DebugArtifacts {
  screenshot: Buffer | null;
  html: string;
  payloads: readonly CapturedPayload[];
}

export function buildDebugPrefix(date: string, mode: string, attempt: number): string {
  return `${date}-${mode}-attempt${attempt}`;
}

/** Writes the screenshot, markup and at most `maxPayloads` payloads; returns the written paths. */
export async function writeDebugArtifacts(
  dir: string,
  prefix: string,
  artifacts: DebugArtifacts,
  maxPayloads: number
): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });
  const written: string[] = [];

  if (artifacts.screenshot) {
    const screenshotPath = path.join(dir, `${prefix}.png`);
    await fs.writeFile(screenshotPath, artifacts.screenshot);
    written.push(screenshotPath);
  }

  const htmlPath = path.join(dir, `${prefix}.html`);
  await fs.writeFile(htmlPath, artifacts.html, 'utf8');
  written.push(htmlPath);

  const payloads = artifacts.payloads.slice(0, maxPayloads);
  for (const [index, payload] of payloads.entries()) {
    const payloadPath = path.join(dir, `${prefix}-payload-${String(index + 1).padStart(2, '0')}.json`);
    const document = { url: payload.url, contentType: payload.contentType, body: payload.body };
    await fs.writeFile(payloadPath, JSON.stringify(document, null, 2), 'utf8');
    written.push(payloadPath);
  }

  return written;
}
