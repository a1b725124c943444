/**
 * One side of a cross-namespace authorization check
 */
export interface Reference {
  group: string;
  kind: string;
  namespace: string;
  name: string;
}

/**
 * Decides whether `from` may point at `to`. Errors are treated as denial by
 * the resolver.
 */
export interface ReferenceValidator {
  isReferenceAllowed(from: Reference, to: Reference, signal?: AbortSignal): Promise<boolean>;
}

/**
 * The parts of a Service the resolver needs
 */
export interface BackendService {
  type?: string;
  externalName?: string;
}

/**
 * Reads Services. Must reject with an error satisfying `isNotFoundError` when
 * the Service does not exist.
 */
export interface ServiceReader {
  getService(namespace: string, name: string, signal?: AbortSignal): Promise<BackendService>;
}
