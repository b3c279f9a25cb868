/**
 * The version of the library, sent in the `Client-Version` header.
 */
const version = "0.1.0";

export { version };
