import React from 'react';
import ReactDOM from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import { App } from './App';
import { createApiClient } from './api';
import './index.css';
import { Session } from './session';
import { AppStateProvider } from './store';
import { AuthProvider } from './contexts/AuthContext';

const session = new Session(window.localStorage);
const api = createApiClient({
  baseUrl: import.meta.env.VITE_API_URL ?? '',
  session,
  onAuthFailure: () => {
    if (window.location.pathname !== '/login') window.location.assign('/login');
  }
});

const root = document.getElementById('root');
if (!root) throw new Error('Missing #root element');

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <BrowserRouter>
      <AuthProvider api={api} session={session}>
        <AppStateProvider api={api}>
          <App />
        </AppStateProvider>
      </AuthProvider>
    </BrowserRouter>
  </React.StrictMode>
);
