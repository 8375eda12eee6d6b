import type { EndpointDefinitions } from '../core/types.js';
import {
  includeTemplateSchema,
  listTeamsRequestSchema,
  listTeamsResponseSchema,
  relatedTagsFilterSchema,
  sportsMarketTypesResponseSchema,
  sportsMetadataResponseSchema,
  tagIdPathSchema,
  tagRelationshipsResponseSchema,
  tagSchema,
  tagSlugPathSchema,
  tagsRequestSchema,
  tagsResponseSchema,
} from './schemas.js';

/**
 * Every Gamma API endpoint the client reads, as data.
 */
export const gammaEndpoints = {
  teams: {
    method: 'GET',
    path: 'teams',
    $search: listTeamsRequestSchema,
    response: listTeamsResponseSchema,
  },
  sports: {
    method: 'GET',
    path: 'sports',
    response: sportsMetadataResponseSchema,
  },
  sportsMarketTypes: {
    method: 'GET',
    path: 'sports/market-types',
    response: sportsMarketTypesResponseSchema,
  },
  tags: {
    method: 'GET',
    path: 'tags',
    $search: tagsRequestSchema,
    response: tagsResponseSchema,
  },
  tagById: {
    method: 'GET',
    path: 'tags/{id}',
    $path: tagIdPathSchema,
    $search: includeTemplateSchema,
    response: tagSchema,
  },
  tagBySlug: {
    method: 'GET',
    path: 'tags/slug/{slug}',
    $path: tagSlugPathSchema,
    $search: includeTemplateSchema,
    response: tagSchema,
  },
  tagRelationshipsById: {
    method: 'GET',
    path: 'tags/{id}/related-tags',
    $path: tagIdPathSchema,
    $search: relatedTagsFilterSchema,
    response: tagRelationshipsResponseSchema,
  },
  tagRelationshipsBySlug: {
    method: 'GET',
    path: 'tags/slug/{slug}/related-tags',
    $path: tagSlugPathSchema,
    $search: relatedTagsFilterSchema,
    response: tagRelationshipsResponseSchema,
  },
  relatedTagsById: {
    method: 'GET',
    path: 'tags/{id}/related-tags/tags',
    $path: tagIdPathSchema,
    $search: relatedTagsFilterSchema,
    response: tagsResponseSchema,
  },
  relatedTagsBySlug: {
    method: 'GET',
    path: 'tags/slug/{slug}/related-tags/tags',
    $path: tagSlugPathSchema,
    $search: relatedTagsFilterSchema,
    response: tagsResponseSchema,
  },
} as const satisfies EndpointDefinitions;
