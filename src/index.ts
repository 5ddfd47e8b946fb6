#!/usr/bin/env node

/**
 * Entry point: serves the Jira tools to MCP hosts over HTTP + SSE.
 */

import 'dotenv/config';
import './logger.js'; // Before anything else logs, so console is patched early.
import { createApp } from './app.js';
import { loadSettings } from './config.js';
import { JiraTools } from './jiraTool.js';

const settings = loadSettings();
const tools = JiraTools.fromSettings(settings);

createApp(settings, tools).listen(settings.port, () => {
  console.log(`[SERVER] MCP SSE/HTTP server listening on port ${settings.port} (read-only: ${settings.readOnly})`);
});
