import React from 'react';
import { FileText, FileType, type LucideIcon } from 'lucide-react';
import type { DocumentFormat } from '../types';
import { he } from '../i18n';

interface FormatSelectorProps {
  value: DocumentFormat;
  onChange: (format: DocumentFormat) => void;
  disabled?: boolean;
}

const OPTIONS: Array<{ format: DocumentFormat; label: string; Icon: LucideIcon }> = [
  { format: 'docx', label: he.formatDocx, Icon: FileText },
  { format: 'pdf', label: he.formatPdf, Icon: FileType },
];

export const FormatSelector: React.FC<FormatSelectorProps> = ({ value, onChange, disabled }) => (
  <fieldset className="flex items-center gap-3" disabled={disabled}>
    <legend className="text-sm text-slate-600 mb-1">{he.formatLabel}</legend>
    {OPTIONS.map(({ format, label, Icon }) => (
      <label
        key={format}
        className={`flex items-center gap-1 rounded-md border px-3 py-1 text-sm cursor-pointer ${
          value === format ? 'border-gold bg-amber-50 text-ink' : 'border-slate-300 text-slate-600'
        }`}
      >
        <input
          type="radio"
          name="document-format"
          value={format}
          checked={value === format}
          onChange={() => onChange(format)}
          className="sr-only"
        />
        <Icon className="w-4 h-4" />
        {label}
      </label>
    ))}
  </fieldset>
);
