#!/usr/bin/env node
import { startServer } from './server.js';

await startServer();
