import React, { useState } from 'react';
import { Download, Loader2 } from 'lucide-react';
import type { DocumentFormat } from '../types';
import { ApiRequestError, generatorClient, saveDownloadedFile } from '../services/generatorClient';
import { useToast } from './ui/Toast';
import { FormatSelector } from './FormatSelector';
import { StanzaPreview } from './StanzaPreview';
import { he } from '../i18n';

interface SingleNameFormProps {
  defaultFormat: DocumentFormat;
}

export const SingleNameForm: React.FC<SingleNameFormProps> = ({ defaultFormat }) => {
  const { showToast } = useToast();
  const [name, setName] = useState('');
  const [format, setFormat] = useState<DocumentFormat>(defaultFormat);
  const [busy, setBusy] = useState(false);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    if (!name.trim()) {
      showToast({ type: 'error', message: he.singleMissingName });
      return;
    }

    setBusy(true);
    try {
      const file = await generatorClient.downloadNameDocument(name, format);
      saveDownloadedFile(file);
      showToast({ type: 'success', message: he.singleSuccess });
    } catch (error) {
      console.error(error);
      const message = error instanceof ApiRequestError && error.messageHe ? error.messageHe : he.genericError;
      showToast({ type: 'error', message });
    } finally {
      setBusy(false);
    }
  };

  return (
    <form onSubmit={(event) => void handleSubmit(event)} className="space-y-4">
      <h2 className="text-lg font-semibold text-ink">{he.singleTitle}</h2>
      <label className="block">
        <span className="text-sm text-slate-600">{he.singleNameLabel}</span>
        <input
          type="text"
          value={name}
          onChange={(e) => setName(e.target.value)}
          placeholder={he.singleNamePlaceholder}
          className="mt-1 w-full rounded-md border border-slate-300 px-3 py-2 font-hebrew text-lg"
          dir="rtl"
        />
      </label>
      <FormatSelector value={format} onChange={setFormat} disabled={busy} />
      <button
        type="submit"
        disabled={busy}
        className="inline-flex items-center gap-2 rounded-md bg-ink px-4 py-2 text-white disabled:opacity-60"
      >
        {busy ? <Loader2 className="w-4 h-4 animate-spin" /> : <Download className="w-4 h-4" />}
        {busy ? he.working : he.singleGenerate}
      </button>
      <StanzaPreview name={name} />
    </form>
  );
};
