import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { resolveGameConfig } from './lib/config';
import { RoundController } from './lib/round-controller';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

const controller = new RoundController(resolveGameConfig(import.meta.env));

createRoot(container).render(
  <StrictMode>
    <App controller={controller} />
  </StrictMode>
);
