export const DEFAULT_HTTP_PORT = 80;
export const DEFAULT_HTTPS_PORT = 443;

/**
 * Weight of a backend reference that does not set one
 */
export const DEFAULT_BACKEND_WEIGHT = 1;

/** Core resources use the empty group; `core` is accepted as an alias. */
export const BACKEND_GROUP_CORE = '';
export const BACKEND_GROUP_CORE_ALIAS = 'core';
export const BACKEND_KIND_SERVICE = 'Service';

export const SERVICE_TYPE_EXTERNAL_NAME = 'ExternalName';

/**
 * Message of every log entry describing a route feature the tunnel cannot express
 */
export const PARTIALLY_APPLIED = 'route configuration partially applied';
