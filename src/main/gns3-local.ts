import { execCommand, readErrorField, type CommandRunner } from './probes/helper.js';

export type LocalGns3Install = {
  installed: boolean;
  found: Record<string, boolean>;
  versions: Record<string, string>;
};

const GNS3_BINARIES = ['gns3', 'gns3server', 'gns3-gui'];

/**
 * Checks which GNS3 binaries exist on this host. A binary that runs but
 * whose version cannot be read still counts as installed.
 */
export const checkLocalGns3 = async (run: CommandRunner = execCommand): Promise<LocalGns3Install> => {
  const found: Record<string, boolean> = {};
  const versions: Record<string, string> = {};

  for (const binary of GNS3_BINARIES) {
    try {
      const { stdout, stderr } = await run(binary, ['--version'], { timeoutMs: 2000 });
      found[binary] = true;
      versions[binary] = (stdout || stderr).trim().split(/\r?\n/)[0] || 'installed (version unknown)';
    } catch (error) {
      const missing = readErrorField(error, 'code') === 'ENOENT';
      found[binary] = !missing;
      if (!missing) versions[binary] = 'installed (version unknown)';
    }
  }

  return {
    installed: Object.values(found).some(Boolean),
    found,
    versions,
  };
};

export const createLocalGns3Check = (run?: CommandRunner) => {
  let cached: Promise<LocalGns3Install> | null = null;
  return () => {
    cached ??= checkLocalGns3(run);
    return cached;
  };
};
