import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['backend/vitest.config.ts', 'frontend/vite.config.ts']);
