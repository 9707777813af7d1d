// src/cli/bin/walletdesk.ts
// CLI bootstrap (executes the parser).
import { makeCli } from '..';

import { reportError } from '../cli-utils';

makeCli().parseAsync().catch(reportError);
