import { vi } from 'vitest';
import { logger } from '../src/utils/logger.js';

// WebRTC VAD is a native add-on; every suite classifies through the stand-in
vi.mock('node-vad', async () => await import('./fakes/node-vad.js'));

// Keep test output readable; set LOG_LEVEL=debug to see agent logs
logger.silent = process.env.LOG_LEVEL !== 'debug';
