import { configureLogger, LogLevel } from '../logger';

configureLogger({ minLevel: LogLevel.NONE });
