import { resolve } from 'node:path';
import { startFromConfig } from './server/server.js';

startFromConfig(process.argv[2] ?? resolve('binder-config.yaml'));
