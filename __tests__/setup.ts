/**
 * Setup global de Jest: silencia los transportes de electron-log durante los tests.
 */
import { configureLogger } from '../lib/utils/logger';

configureLogger({ fileLevel: 'off', consoleLevel: 'off' });
