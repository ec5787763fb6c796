/**
 * Print the clustered text blocks of one PDF page.
 *
 * Lists every block with its box and representative font, then the
 * plain-text block report.
 *
 * Usage:
 *   npx tsx test-pdfs/cluster-page.ts <path-to-pdf> [page-number (0-based)] [--debug]
 */

import * as path from 'path';
import { clusterPdfPage } from '../src/pdf/PdfLoader';
import { formatBlockReport, toBoxTuple } from '../src/clustering/BlockReport';

async function main(): Promise<void> {
  const args = process.argv.slice(2).filter(a => a !== '--debug');
  const debug = process.argv.includes('--debug');

  const [pdfPath, pageArg] = args;
  if (!pdfPath) {
    console.error('Usage: npx tsx test-pdfs/cluster-page.ts <path-to-pdf> [page-number] [--debug]');
    process.exit(1);
  }

  const absPath = path.resolve(pdfPath);
  const pageNumber = pageArg ? Number.parseInt(pageArg, 10) : 0;
  console.log(`Clustering: ${path.basename(absPath)}, page ${pageNumber}\n`);

  const blocks = await clusterPdfPage(absPath, pageNumber, { debug });

  console.log(`--- ${blocks.length} Blocks ---`);
  blocks.forEach((block, idx) => {
    const box = toBoxTuple(block.bbox).map(v => v.toFixed(1).padStart(6)).join(' ');
    const { font, size, bold, italic } = block.style;
    const flags = `${bold ? 'B' : '-'}${italic ? 'I' : '-'}`;
    console.log(`  [${String(idx + 1).padStart(3)}] ${box}  ${flags} ${size.toFixed(1)}pt ${font}  spans=${block.spans.length}`);
  });

  console.log('\n--- Report ---\n');
  console.log(formatBlockReport(blocks));
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
