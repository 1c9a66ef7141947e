/**
 * Version string, taken from package.json
 */
import packageJson from '../../package.json';

export const BUILD_VERSION: string = packageJson.version;
