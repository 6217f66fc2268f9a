/**
 * Demo tab - Collects text or a document, runs the recommendation pipeline,
 * and shows the returned images
 */

import { useCallback, useEffect, useState } from 'react';
import { DocumentUpload, ImageGallery, Spinner, StatusIndicator } from '../components';
import { MODE_LABELS, runRecommendation } from '../services';
import { useSession } from '../session/SessionContext';
import { useUIStore } from '../stores';
import type { ImageMode, RecommendationResult, SourceDocument } from '../types';

const MODES: ImageMode[] = ['ai', 'stock'];

export default function Demo() {
  const { client, history } = useSession();
  const { apiStatus, isLoading, setApiStatus, setLoading, showToast } = useUIStore();

  const [text, setText] = useState('');
  const [document, setDocument] = useState<SourceDocument | null>(null);
  const [mode, setMode] = useState<ImageMode>('ai');
  const [latest, setLatest] = useState<RecommendationResult | null>(null);

  // Initial status check so the badge is accurate before the first submit
  useEffect(() => {
    let cancelled = false;
    void client.checkStatus().then((status) => {
      if (!cancelled) setApiStatus(status);
    });
    return () => {
      cancelled = true;
    };
  }, [client, setApiStatus]);

  const handleSubmit = useCallback(async (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setLoading(true);
    try {
      const outcome = await runRecommendation(
        { text, document: document ?? undefined, mode },
        { client, history }
      );
      if (outcome.apiStatus) {
        setApiStatus(outcome.apiStatus);
      }
      for (const notice of outcome.notices) {
        showToast(notice.type, notice.message);
      }
      if (outcome.status === 'recommended') {
        setLatest(outcome.result);
      }
    } finally {
      setLoading(false);
    }
  }, [text, document, mode, client, history, setApiStatus, setLoading, showToast]);

  return (
    <section className="space-y-6">
      <div className="flex items-center justify-between">
        <h2 className="text-xl font-semibold">Demo: Get Image Recommendations</h2>
        <StatusIndicator status={apiStatus} />
      </div>

      <form onSubmit={(event) => void handleSubmit(event)} className="space-y-4" aria-label="Recommendation form">
        <div className="space-y-2">
          <label className="text-sm font-medium" htmlFor="recommend-text">
            Enter text here:
          </label>
          <textarea
            id="recommend-text"
            value={text}
            onChange={(event) => setText(event.target.value)}
            rows={5}
            disabled={document !== null}
            className="w-full resize-y rounded-xl border border-[var(--border-color)] bg-transparent px-3 py-2 text-sm focus:outline-none"
          />
        </div>

        <DocumentUpload
          document={document}
          onSelect={setDocument}
          onClear={() => setDocument(null)}
          onError={(message) => showToast('error', message)}
          disabled={isLoading}
        />

        <fieldset className="space-y-2">
          <legend className="text-sm font-medium">Select the type of recommendations you want:</legend>
          <div className="flex gap-4">
            {MODES.map((value) => (
              <label key={value} className="flex items-center gap-2 text-sm">
                <input
                  type="radio"
                  name="image-mode"
                  value={value}
                  checked={mode === value}
                  onChange={() => setMode(value)}
                />
                {MODE_LABELS[value]}
              </label>
            ))}
          </div>
        </fieldset>

        <button
          type="submit"
          disabled={isLoading}
          className="inline-flex items-center gap-2 rounded-full bg-primary-500 px-6 py-2 text-sm font-semibold text-white disabled:opacity-50"
        >
          {isLoading && <Spinner size="sm" />}
          Submit
        </button>
      </form>

      {latest && (
        <section className="space-y-3" data-testid="latest-recommendation">
          <h3 className="text-lg font-medium">Recommended {MODE_LABELS[latest.mode]} Images</h3>
          <ImageGallery payload={latest.payload} caption={MODE_LABELS[latest.mode]} />
        </section>
      )}
    </section>
  );
}
