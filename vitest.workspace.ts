import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['core', 'service']);
