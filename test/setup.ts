import { configureLogging } from '../src/logger';

configureLogging({ silent: true });
