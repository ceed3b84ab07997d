import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['Shared', 'Gmail-MCP', 'FOI-MCP']);
