import { createRequire } from 'node:module';

const requireModule = createRequire(import.meta.url);
const { version } = requireModule('../package.json') as { version: string };

export const VERSION = version;
