import { addLog } from '@insight/shared/logger';
import { main } from './main.js';

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    const message = error instanceof Error ? error.message : String(error);
    addLog(`[CLI] Fatal: ${message}`);
    console.error(message);
    process.exitCode = 1;
  });
