/**
 * Layout Component
 * Title bar, tab navigation, and the active tab's content
 */

import React from 'react';
import { Outlet, NavLink } from 'react-router-dom';
import { ToastContainer } from './Toast';

interface TabItem {
  label: string;
  path: string;
}

export const TABS: TabItem[] = [
  { label: 'Introduction', path: '/' },
  { label: 'Demo', path: '/demo' },
  { label: 'History', path: '/history' },
];

const Layout: React.FC = () => (
  <div className="min-h-screen bg-[var(--bg-primary)] text-[var(--text-primary)]">
    <header className="border-b border-[var(--border-color)]">
      <div className="max-w-4xl mx-auto px-4 pt-6">
        <h1 className="text-2xl font-semibold mb-4">Text-based Image Recommendation App</h1>
        <nav className="flex gap-2" aria-label="Tabs">
          {TABS.map((tab) => (
            <NavLink
              key={tab.path}
              to={tab.path}
              end={tab.path === '/'}
              className={({ isActive }) =>
                `px-4 py-2 text-sm font-medium rounded-t-lg border-b-2 transition-colors ${
                  isActive
                    ? 'border-primary-500 text-primary-600'
                    : 'border-transparent text-[var(--text-secondary)] hover:text-[var(--text-primary)]'
                }`
              }
            >
              {tab.label}
            </NavLink>
          ))}
        </nav>
      </div>
    </header>

    <main className="max-w-4xl mx-auto px-4 py-6">
      <Outlet />
    </main>

    <ToastContainer />
  </div>
);

export default Layout;
