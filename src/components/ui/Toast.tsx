import React, {
  createContext,
  useCallback,
  useContext,
  useState,
  type ReactNode,
} from 'react';
import { X } from 'lucide-react';

type ToastType = 'success' | 'error' | 'info';

type ToastOptions = {
  message: string;
  type?: ToastType;
  /** Extra lines under the message, e.g. names that failed in a batch. */
  details?: string[];
  durationMs?: number;
};

type ToastContextValue = {
  showToast: (options: ToastOptions) => void;
};

type ToastState = {
  id: number;
  message: string;
  type: ToastType;
  details: string[];
};

const ToastContext = createContext<ToastContextValue | undefined>(undefined);

let toastIdCounter = 0;

const DEFAULT_DURATION_MS = 3000;

const getToastClasses = (type: ToastType) => {
  if (type === 'success') {
    return 'border-green-600 text-green-900';
  }
  if (type === 'error') {
    return 'border-red-600 text-red-900';
  }
  return 'border-gold text-ink';
};

export const ToastProvider: React.FC<{ children: ReactNode }> = ({ children }) => {
  const [toasts, setToasts] = useState<ToastState[]>([]);

  const removeToast = useCallback((id: number) => {
    setToasts((prev) => prev.filter((t) => t.id !== id));
  }, []);

  const showToast = useCallback(
    ({ message, type = 'info', details = [], durationMs }: ToastOptions) => {
      const id = ++toastIdCounter;
      setToasts((prev) => [...prev, { id, message, type, details }]);

      // toasts with details stay longer
      const timeout = durationMs ?? (details.length ? DEFAULT_DURATION_MS * 3 : DEFAULT_DURATION_MS);
      window.setTimeout(() => {
        removeToast(id);
      }, timeout);
    },
    [removeToast],
  );

  return (
    <ToastContext.Provider value={{ showToast }}>
      {children}
      <div
        className="fixed top-4 left-4 z-50 flex flex-col gap-2 items-start pointer-events-none"
        dir="rtl"
      >
        {toasts.map((toast) => (
          <div
            key={toast.id}
            role="status"
            className={`pointer-events-auto max-w-sm bg-white rounded-lg shadow-lg px-3 py-2 border-r-4 text-sm flex items-start gap-2 ${getToastClasses(
              toast.type,
            )}`}
          >
            <div className="flex-1">
              <span className="whitespace-pre-line">{toast.message}</span>
              {toast.details.length > 0 && (
                <ul className="mt-1 list-disc pr-4 text-xs opacity-80">
                  {toast.details.map((line) => (
                    <li key={line}>{line}</li>
                  ))}
                </ul>
              )}
            </div>
            <button
              type="button"
              onClick={() => removeToast(toast.id)}
              className="p-1 rounded hover:bg-slate-100 text-slate-500"
              aria-label="סגירה"
            >
              <X className="w-3 h-3" />
            </button>
          </div>
        ))}
      </div>
    </ToastContext.Provider>
  );
};

export const useToast = (): ToastContextValue => {
  const ctx = useContext(ToastContext);
  if (!ctx) {
    throw new Error('useToast must be used within a ToastProvider');
  }
  return ctx;
};
