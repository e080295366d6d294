import { Command } from 'commander';
import { pipeUrlToCacheName, urlToCacheName } from '../../cache/cache-name.js';
import { exitWithError } from '../utils/options.js';

interface NameOptions {
  ndir: string;
  pipe: boolean;
}

export const nameCommand = new Command('name')
  .description('Print the cache-relative path a URL is stored under')
  .argument('<url>', 'URL to name')
  .option('--ndir <n>', 'Number of parent directories to keep', '0')
  .option('--pipe', 'Name after the URL inside a "pipe:" command', false)
  .action((url: string, options: NameOptions) => {
    try {
      const ndir = Number(options.ndir);
      if (!Number.isInteger(ndir) || ndir < 0) {
        throw new Error(`Invalid ndir value: "${options.ndir}"`);
      }
      const name = options.pipe ? pipeUrlToCacheName(url, ndir) : urlToCacheName(url, ndir);
      process.stdout.write(name + '\n');
    } catch (err) {
      exitWithError(err);
    }
  });
