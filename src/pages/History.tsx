/**
 * History tab - Past recommendations of this session, oldest first
 */

import { ImageGallery } from '../components';
import { MODE_LABELS } from '../services';
import { useHistoryEntries } from '../session/SessionContext';
import { formatTimestamp } from '../utils/formatTimestamp';

export default function History() {
  const entries = useHistoryEntries();

  return (
    <section className="space-y-4">
      <h2 className="text-xl font-semibold">History of Recommendations</h2>
      <p className="text-sm text-[var(--text-secondary)]">
        Here are your previous recommendations based on the input text:
      </p>

      {entries.length === 0 ? (
        <p className="text-sm text-[var(--text-muted)]" data-testid="history-empty">
          No history available yet.
        </p>
      ) : (
        <ol className="space-y-6" data-testid="history-list">
          {entries.map((entry) => (
            <li key={entry.id} className="space-y-2 border-b border-[var(--border-color)] pb-4" data-testid="history-entry">
              <p className="text-sm">
                <strong>Timestamp:</strong> <span data-testid="history-timestamp">{formatTimestamp(entry.createdAt)}</span>
              </p>
              <p className="text-sm whitespace-pre-wrap">
                <strong>Text:</strong> <span data-testid="history-text">{entry.query}</span>
              </p>
              <p className="text-sm">
                <strong>Type:</strong> {MODE_LABELS[entry.mode]}
              </p>
              <ImageGallery payload={entry.payload} caption={MODE_LABELS[entry.mode]} />
            </li>
          ))}
        </ol>
      )}
    </section>
  );
}
