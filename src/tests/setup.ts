import { Logger, LogLevel } from '../utils/Logger';

Logger.getInstance().setLogLevel(LogLevel.SILENT);
