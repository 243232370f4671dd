import JSZip from 'jszip';
import { SpreadsheetError, describeError } from '../errors';
import type { DocumentRenderer } from '../renderers';
import type { BatchFailure, BatchResult, GeneratedFile, Psalm119Stanzas } from '../types';
import { buildDocumentFileName, dedupeFileName } from '../utils/documentFileName';
import { logInfo, logWarn } from '../utils/logging';
import { resolveNameStanzas } from '../utils/nameStanzas';
import { readNamesFromSpreadsheet } from './namesSpreadsheet';

/**
 * Renders one document per name, in order. A name that fails (no Hebrew
 * letters, renderer error) is recorded with its reason and the batch moves on.
 */
export async function generateBatch(
  names: readonly string[],
  stanzas: Psalm119Stanzas,
  renderer: DocumentRenderer,
): Promise<BatchResult> {
  const files: GeneratedFile[] = [];
  const failures: BatchFailure[] = [];
  const takenFileNames = new Set<string>();

  for (const name of names) {
    try {
      const sections = resolveNameStanzas(name, stanzas);
      const bytes = await renderer.render(name, sections);
      const fileName = dedupeFileName(buildDocumentFileName(name, renderer.format), takenFileNames);
      takenFileNames.add(fileName);
      files.push({ name, fileName, bytes });
    } catch (error) {
      const { code, reason } = describeError(error);
      logWarn(`Skipping name in batch: ${name}`, { code, reason });
      failures.push({ name, code, reason });
    }
  }

  logInfo('Batch finished', { total: names.length, succeeded: files.length, failed: failures.length });
  return { files, failures };
}

export async function buildBatchArchive(result: BatchResult): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const file of result.files) {
    zip.file(file.fileName, file.bytes);
  }
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}

/**
 * Spreadsheet problems (unreadable, no "Name" column, no names) fail the
 * whole batch before any document is rendered.
 */
export async function generateBatchFromSpreadsheet(
  data: Uint8Array,
  stanzas: Psalm119Stanzas,
  renderer: DocumentRenderer,
): Promise<BatchResult> {
  const names = readNamesFromSpreadsheet(data);
  if (!names.length) {
    throw new SpreadsheetError('NO_NAMES', "No valid names found in the 'Name' column.");
  }
  return generateBatch(names, stanzas, renderer);
}
