import React, { useEffect, useState } from 'react';
import { BookOpen, FileSpreadsheet, User } from 'lucide-react';
import type { DocumentFormat } from './types';
import { ToastProvider } from './components/ui/Toast';
import { SingleNameForm } from './components/SingleNameForm';
import { BatchNamesForm } from './components/BatchNamesForm';
import { he } from './i18n';

type Tab = 'single' | 'batch';

interface HealthResponse {
  status: string;
  defaultFormat: DocumentFormat;
}

const App: React.FC = () => {
  const [tab, setTab] = useState<Tab>('single');
  const [defaultFormat, setDefaultFormat] = useState<DocumentFormat | null>(null);
  const [loadError, setLoadError] = useState(false);

  useEffect(() => {
    let cancelled = false;
    fetch('/api/health')
      .then(async (response) => {
        if (!response.ok) throw new Error(`Health check failed: ${response.status}`);
        const data: HealthResponse = await response.json();
        if (!cancelled) setDefaultFormat(data.defaultFormat);
      })
      .catch((error: unknown) => {
        console.error(error);
        if (!cancelled) setLoadError(true);
      });
    return () => {
      cancelled = true;
    };
  }, []);

  const tabClass = (value: Tab) =>
    `flex items-center gap-2 px-4 py-2 text-sm border-b-2 ${
      tab === value ? 'border-gold text-ink font-semibold' : 'border-transparent text-slate-500'
    }`;

  return (
    <ToastProvider>
      <div className="min-h-screen bg-parchment text-ink" dir="rtl">
        <main className="mx-auto max-w-2xl px-4 py-10">
          <header className="mb-6">
            <h1 className="flex items-center gap-2 text-2xl font-bold">
              <BookOpen className="w-6 h-6 text-gold" />
              {he.appTitle}
            </h1>
            <p className="mt-2 text-sm text-slate-600">{he.appSubtitle}</p>
          </header>

          {loadError && <p className="text-red-700">{he.genericError}</p>}
          {!loadError && !defaultFormat && <p className="text-slate-500">{he.loadingText}</p>}

          {defaultFormat && (
            <>
              <nav className="mb-4 flex border-b border-slate-200">
                <button type="button" className={tabClass('single')} onClick={() => setTab('single')}>
                  <User className="w-4 h-4" />
                  {he.tabSingle}
                </button>
                <button type="button" className={tabClass('batch')} onClick={() => setTab('batch')}>
                  <FileSpreadsheet className="w-4 h-4" />
                  {he.tabBatch}
                </button>
              </nav>
              <section className="rounded-lg bg-white/70 p-5 shadow-sm">
                {tab === 'single' ? (
                  <SingleNameForm defaultFormat={defaultFormat} />
                ) : (
                  <BatchNamesForm defaultFormat={defaultFormat} />
                )}
              </section>
            </>
          )}
        </main>
      </div>
    </ToastProvider>
  );
};

export default App;
