import React, { useState } from 'react';
import { FileSpreadsheet, Loader2, PackageOpen } from 'lucide-react';
import type { DocumentFormat, NamesPreview } from '../types';
import { ApiRequestError, generatorClient, saveDownloadedFile } from '../services/generatorClient';
import { useToast } from './ui/Toast';
import { FormatSelector } from './FormatSelector';
import { he } from '../i18n';

interface BatchNamesFormProps {
  defaultFormat: DocumentFormat;
}

const errorMessage = (error: unknown) =>
  error instanceof ApiRequestError && error.messageHe ? error.messageHe : he.genericError;

export const BatchNamesForm: React.FC<BatchNamesFormProps> = ({ defaultFormat }) => {
  const { showToast } = useToast();
  const [file, setFile] = useState<File | null>(null);
  const [preview, setPreview] = useState<NamesPreview | null>(null);
  const [format, setFormat] = useState<DocumentFormat>(defaultFormat);
  const [busy, setBusy] = useState(false);

  const loadPreview = async (selected: File) => {
    setBusy(true);
    try {
      setPreview(await generatorClient.previewNames(selected));
    } catch (error) {
      console.error(error);
      setPreview(null);
      showToast({ type: 'error', message: errorMessage(error) });
    } finally {
      setBusy(false);
    }
  };

  const handleFileChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    const selected = event.target.files?.[0] ?? null;
    setFile(selected);
    setPreview(null);
    if (selected) {
      void loadPreview(selected);
    }
  };

  const handleGenerate = async () => {
    if (!file) return;
    setBusy(true);
    try {
      const result = await generatorClient.downloadBatch(file, format);
      saveDownloadedFile(result);
      const total = result.succeeded + result.failed;
      showToast({
        type: result.failed ? 'info' : 'success',
        message: result.failed
          ? `${he.batchSummary(result.succeeded, total)}\n${he.batchFailuresTitle}`
          : he.batchSummary(result.succeeded, total),
        details: result.failures.map((failure) => `${failure.name} – ${failure.reason}`),
      });
    } catch (error) {
      console.error(error);
      showToast({ type: 'error', message: errorMessage(error) });
    } finally {
      setBusy(false);
    }
  };

  return (
    <div className="space-y-4">
      <h2 className="text-lg font-semibold text-ink">{he.batchTitle}</h2>
      <p className="text-sm text-slate-600">{he.batchInstructions}</p>

      <label className="flex items-center gap-2 text-sm text-slate-700">
        <FileSpreadsheet className="w-5 h-5 text-green-700" />
        <span>{he.batchFileLabel}</span>
        <input
          type="file"
          accept=".xlsx,.xls,.csv"
          onChange={handleFileChange}
          disabled={busy}
          className="text-xs"
        />
      </label>

      {!file && <p className="text-sm text-slate-500">{he.batchNoFile}</p>}

      {preview && (
        <div className="rounded-md border border-slate-200 bg-white px-3 py-2">
          <h3 className="text-sm font-semibold text-slate-700">{he.batchPreviewTitle}</h3>
          <ul className="mt-1 list-disc pr-5 font-hebrew">
            {preview.names.map((name, index) => (
              <li key={`${name}-${index}`}>{name}</li>
            ))}
          </ul>
          <p className="mt-1 text-xs text-slate-500">{he.batchPreviewTotal(preview.total)}</p>
        </div>
      )}

      <FormatSelector value={format} onChange={setFormat} disabled={busy} />

      <button
        type="button"
        onClick={() => void handleGenerate()}
        disabled={busy || !preview}
        className="inline-flex items-center gap-2 rounded-md bg-ink px-4 py-2 text-white disabled:opacity-60"
      >
        {busy ? <Loader2 className="w-4 h-4 animate-spin" /> : <PackageOpen className="w-4 h-4" />}
        {busy ? he.working : he.batchGenerate}
      </button>
    </div>
  );
};
