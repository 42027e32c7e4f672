import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { Dashboard } from './views/Dashboard';

const container = document.getElementById('root');
if (!container) throw new Error('Root element #root not found');

createRoot(container).render(
  <StrictMode>
    <Dashboard />
  </StrictMode>,
);
