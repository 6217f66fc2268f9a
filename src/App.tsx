/**
 * App Component
 * Application entry point with routing and the per-tab session
 */

import React, { useState } from 'react';
import { RouterProvider } from 'react-router-dom';
import { loadConfig, type AppConfig } from './config';
import { createAppRouter } from './router';
import { ConfigError } from './services/errors';
import { SessionProvider } from './session/SessionContext';

type ConfigState = { ok: true; config: AppConfig } | { ok: false; message: string };

const readConfig = (): ConfigState => {
  try {
    return { ok: true, config: loadConfig() };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('[App] Invalid configuration:', error.message);
      return { ok: false, message: error.message };
    }
    throw error;
  }
};

function App() {
  const [configState] = useState(readConfig);
  const [router] = useState(createAppRouter);

  if (!configState.ok) {
    return (
      <div role="alert" className="max-w-xl mx-auto mt-16 rounded-lg border border-red-500/50 bg-red-50 p-4 text-sm text-red-600">
        Configuration error: {configState.message}
      </div>
    );
  }

  return (
    <React.StrictMode>
      <SessionProvider config={configState.config}>
        <RouterProvider router={router} />
      </SessionProvider>
    </React.StrictMode>
  );
}

export default App;
