/**
 * Introduction tab - What the app does and how to use it
 */

const STEPS = [
  'Go to the Demo tab.',
  'Enter text or upload a file.',
  'Choose AI-generated or stock images.',
  'Submit to see recommended images.',
  'Check the History tab to view past recommendations by timestamp.',
];

export default function Introduction() {
  return (
    <section className="space-y-4">
      <h2 className="text-xl font-semibold">Introduction</h2>
      <p className="text-sm text-[var(--text-secondary)]">
        This application lets you enter text or upload a text file (txt, docx, pdf) and receive
        recommendations for images that match its content. Your text is sent to an external
        recommendation service and the recommended images are shown directly in the app.
      </p>
      <h3 className="text-lg font-medium">How to use</h3>
      <ol className="list-decimal pl-6 space-y-1 text-sm">
        {STEPS.map((step) => (
          <li key={step}>{step}</li>
        ))}
      </ol>
    </section>
  );
}
