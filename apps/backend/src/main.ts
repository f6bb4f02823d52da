import 'reflect-metadata';

import { bootstrap } from './bootstrap';

bootstrap().catch((error) => {
  console.error('Fatal error starting mesh telemetry engine', error);
  process.exit(1);
});
