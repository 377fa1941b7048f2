import { Logger } from '@nestjs/common';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// Use cases log through the Nest logger; keep test output readable
Logger.overrideLogger(false);
