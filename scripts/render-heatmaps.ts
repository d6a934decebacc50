/**
 * Render heatmaps for one EDF file or every EDF file in a folder.
 *
 * Usage:
 *   tsx scripts/render-heatmaps.ts <file.edf|folder> <outDir> [durationIndex] [label ...]
 *
 * A single file gets one PNG per signal plus a panel; a folder gets one
 * panel per recording, titled with the file name.
 */

import { mkdir, readdir, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createHeatmapPanel, createHeatmapViews } from '../src/heatmap';
import { PngHeatmapRenderer } from '../src/renderer';
import { loadEDFFile, toRecording } from '../src/signal';
import type { Recording } from '../src/types';
import { createLogger } from '../src/utils/logger';

const logger = createLogger('scripts:render-heatmaps');

function safeName(label: string): string {
  return label.replace(/[^A-Za-z0-9._-]+/g, '_');
}

async function renderPanel(
  recording: Recording,
  subjectId: string,
  outDir: string,
  durationIndex: number,
  labels: string[]
) {
  const panel = createHeatmapPanel(recording, labels, {
    durationIndex,
    panelTitle: subjectId,
    figureSize: { width: 1200, height: 855 },
  });

  const out = join(outDir, `${subjectId}_panel.png`);
  await writeFile(out, new PngHeatmapRenderer().renderPanel(panel));
  logger.info('Wrote panel', { out, panes: panel.panes.length });
}

async function renderFile(path: string, outDir: string, durationIndex: number, labels: string[]) {
  const renderer = new PngHeatmapRenderer();
  const subjectId = basename(path, extname(path));
  const recording = toRecording(await loadEDFFile(path));

  for (const view of createHeatmapViews(recording, labels, { durationIndex, subjectId })) {
    const out = join(outDir, `${subjectId}_${safeName(view.label)}.png`);
    await writeFile(out, renderer.render(view));
    logger.info('Wrote heatmap', { out, rows: view.raster.rows, cols: view.raster.cols });
  }

  await renderPanel(recording, subjectId, outDir, durationIndex, labels);
}

async function main() {
  const [input, outDir, durationArg, ...labels] = process.argv.slice(2);

  if (!input || !outDir) {
    console.log('Usage: tsx scripts/render-heatmaps.ts <file.edf|folder> <outDir> [durationIndex] [label ...]');
    process.exitCode = 1;
    return;
  }

  const durationIndex = durationArg ? Number(durationArg) : 7;
  await mkdir(outDir, { recursive: true });

  if (!(await stat(input)).isDirectory()) {
    await renderFile(input, outDir, durationIndex, labels);
    return;
  }

  const files = (await readdir(input)).filter(f => extname(f).toLowerCase() === '.edf').sort();
  logger.info('Summarising folder', { input, files: files.length });

  for (const file of files) {
    try {
      const recording = toRecording(await loadEDFFile(join(input, file)));
      await renderPanel(recording, basename(file, extname(file)), outDir, durationIndex, labels);
    } catch (error) {
      logger.error('Skipping recording', error instanceof Error ? error : new Error(String(error)), { file });
    }
  }
}

main().catch(error => {
  logger.error('Rendering failed', error instanceof Error ? error : new Error(String(error)));
  process.exitCode = 1;
});
