export { envString, envInt, envPath } from "./utils/env.js";
export { generateId } from "./utils/id.js";
export { sha256, digestMatches } from "./crypto/hash.js";
export { encodeContent, decodeContent, isBase64 } from "./encoding/base64.js";
