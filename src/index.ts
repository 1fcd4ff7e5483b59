#!/usr/bin/env node
import 'module-alias/register';

import RadioLauncherController from '@/controllers/radio-launcher-controller';

new RadioLauncherController()
  .run()
  .then((exitCode: number) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
