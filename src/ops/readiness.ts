/**
 * Readiness flag, set by index.ts once the pipeline and the REST server are up,
 * cleared again when shutdown begins. Read by /health/ready.
 */

let _ready = false;

export function isReady(): boolean {
  return _ready;
}

export function setReady(value: boolean): void {
  _ready = value;
}
