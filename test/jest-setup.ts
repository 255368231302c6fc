import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

process.env.VOXEDIT_CONFIG_DIR = mkdtempSync(join(tmpdir(), 'voxedit-jest-'));
