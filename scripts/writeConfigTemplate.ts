import path from 'path';
import { DEFAULT_CONFIG_FILE, writeConfigTemplate } from '../src/config/relayConfig';

const target = path.resolve(process.argv[2] ?? DEFAULT_CONFIG_FILE);
writeConfigTemplate(target);
console.log(`wrote config template to ${target}`);
