import { loadConfig } from './config';
import { ConfigError } from './errors';
import { launch } from './launcher';

async function main(): Promise<number> {
  try {
    return await launch(loadConfig());
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(`[CONFIG] ${issue}`);
      }
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Preview launcher crashed:', error);
    process.exitCode = 1;
  });
