import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// Keep log files and contexts out of the real home directory
const root = fs.mkdtempSync(path.join(os.tmpdir(), 'dsh-test-'));
process.env.DSH_CONFIG_DIRECTORY = path.join(root, 'config');
process.env.DSH_LOG_DIRECTORY = path.join(root, 'logs');
