import { VERSION } from "../version.js";

/**
 * Library version used in the default User-Agent header.
 */
export { VERSION };

/**
 * Default `User-Agent`, identifying the library, Node.js version and platform.
 */
export const DEFAULT_USER_AGENT = `dd-api-typescript/${VERSION} (node ${process.version}; os ${process.platform}; arch ${process.arch})`;
