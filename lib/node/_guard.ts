export function assertNodeRuntime(feature = 'lib/node/*'): void {
  if (typeof process === 'undefined' || !process.versions?.node) {
    throw new Error(`${feature} needs a Node.js runtime (filesystem access)`);
  }
}
