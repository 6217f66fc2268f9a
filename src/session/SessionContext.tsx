/**
 * Session Context - Hands one session's client and history to the component tree
 */

import React, { createContext, useContext, useState } from 'react';
import { useStore } from 'zustand';
import type { AppConfig } from '../config';
import { createRecommendationClient, type RecommendationClient } from '../services/recommendationClient';
import { createHistoryStore, type HistoryStore } from '../stores/historyStore';
import type { RecommendationResult } from '../types';

export interface Session {
  client: RecommendationClient;
  history: HistoryStore;
}

export const createSession = (config: AppConfig): Session => ({
  client: createRecommendationClient(config),
  history: createHistoryStore(),
});

const SessionContext = createContext<Session | null>(null);

interface SessionProviderProps {
  /** Prebuilt session; when omitted one is created from `config` */
  session?: Session;
  config?: AppConfig;
  children: React.ReactNode;
}

export const SessionProvider: React.FC<SessionProviderProps> = ({ session, config, children }) => {
  const [value] = useState<Session>(() => {
    if (session) return session;
    if (config) return createSession(config);
    throw new Error('SessionProvider needs either a session or a config');
  });

  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>;
};

export function useSession(): Session {
  const session = useContext(SessionContext);
  if (!session) {
    throw new Error('useSession must be used inside a SessionProvider');
  }
  return session;
}

/**
 * Subscribe to the current session's history entries
 */
export function useHistoryEntries(): readonly RecommendationResult[] {
  const { history } = useSession();
  return useStore(history, state => state.entries);
}
