#!/usr/bin/env node
import { main } from '../index.js';

function isMainModule(): boolean {
  const mainFile = process.argv[1];
  return Boolean(
    mainFile &&
      (mainFile.endsWith('cli.js') ||
        mainFile.endsWith('cli.ts') ||
        mainFile.includes('check-proxmox')),
  );
}

if (isMainModule()) {
  main()
    .then((status) => {
      process.exitCode = status;
    })
    .catch((error) => {
      console.error('Unhandled error:', error);
      process.exitCode = 3;
    });
}
