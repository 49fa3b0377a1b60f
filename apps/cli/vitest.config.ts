import { defineConfig } from '@pdf-outline/vitest-config';

export default defineConfig();
