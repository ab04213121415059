import chalk from 'chalk';
import { setLogLevel } from '@core/utils/logger';

// Assert on plain text output
chalk.level = 0;

// Keep developer overrides from leaking into test expectations
delete process.env.RECSCOPE_PARALLEL_LIMIT;
delete process.env.RECSCOPE_LOG_DIR;
delete process.env.RECSCOPE_DEBUG;

setLogLevel(process.env.TEST_LOG_LEVEL ?? 'error');
