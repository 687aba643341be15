import { setLogHandler } from '../src/logger';

// Keep test output readable; individual tests capture entries when they need them.
setLogHandler(() => undefined);
