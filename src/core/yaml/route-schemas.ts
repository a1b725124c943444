/**
 * arktype schemas for the Gateway API route fields the compiler reads
 */

import { type } from 'arktype';

const MatchTypeSchema = type("'Exact' | 'RegularExpression'");

const FilterSchema = type({
  type: 'string',
});

const HeaderMatchSchema = type({
  'type?': MatchTypeSchema,
  name: 'string',
  value: 'string',
});

const BackendRefSchema = type({
  'group?': 'string',
  'kind?': 'string',
  name: 'string > 0',
  'namespace?': 'string',
  'port?': 'number.integer',
  'weight?': 'number.integer >= 0',
  'filters?': FilterSchema.array(),
});

const ParentRefSchema = type({
  'group?': 'string',
  'kind?': 'string',
  'namespace?': 'string',
  name: 'string',
  'sectionName?': 'string',
  'port?': 'number.integer',
});

const MetadataSchema = type({
  name: 'string > 0',
  'namespace?': 'string',
});

const HTTPRouteMatchSchema = type({
  'path?': {
    'type?': "'Exact' | 'PathPrefix' | 'RegularExpression'",
    'value?': 'string',
  },
  'headers?': HeaderMatchSchema.array(),
  'queryParams?': HeaderMatchSchema.array(),
  'method?': "'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'CONNECT' | 'OPTIONS' | 'TRACE' | 'PATCH'",
});

const HTTPRouteRuleSchema = type({
  'name?': 'string',
  'matches?': HTTPRouteMatchSchema.array(),
  'filters?': FilterSchema.array(),
  'backendRefs?': BackendRefSchema.array(),
});

export const HTTPRouteSchema = type({
  apiVersion: 'string',
  kind: "'HTTPRoute'",
  metadata: MetadataSchema,
  spec: {
    'parentRefs?': ParentRefSchema.array(),
    'hostnames?': 'string[]',
    'rules?': HTTPRouteRuleSchema.array(),
  },
});

const GRPCRouteMatchSchema = type({
  'method?': {
    'type?': MatchTypeSchema,
    'service?': 'string',
    'method?': 'string',
  },
  'headers?': HeaderMatchSchema.array(),
});

const GRPCRouteRuleSchema = type({
  'name?': 'string',
  'matches?': GRPCRouteMatchSchema.array(),
  'filters?': FilterSchema.array(),
  'backendRefs?': BackendRefSchema.array(),
});

export const GRPCRouteSchema = type({
  apiVersion: 'string',
  kind: "'GRPCRoute'",
  metadata: MetadataSchema,
  spec: {
    'parentRefs?': ParentRefSchema.array(),
    'hostnames?': 'string[]',
    'rules?': GRPCRouteRuleSchema.array(),
  },
});
