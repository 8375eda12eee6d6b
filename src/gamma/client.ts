import { RequestClient, type RequestClientProps } from '../core/client.js';
import type { GammaClientError } from '../error/index.js';
import type { RequestOptions } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { gammaEndpoints } from './endpoints.js';
import type {
  ListTeamsRequest,
  ListTeamsResponse,
  RelatedTagsByIdRequest,
  RelatedTagsBySlugRequest,
  SportsMarketTypesResponse,
  SportsMetadataResponse,
  Tag,
  TagRelationship,
  TagsRequest,
} from './schemas.js';

/** Production Gamma API host. */
export const DEFAULT_HOST = 'https://gamma-api.polymarket.com';

/** Options for {@link GammaClient}; `host` defaults to {@link DEFAULT_HOST}. */
export type GammaClientProps = Partial<RequestClientProps>;

/**
 * Typed client for the Gamma metadata API (teams, sports, tags and tag relationships).
 *
 * Each method is a thin binding of a {@link gammaEndpoints} entry onto {@link RequestClient.request};
 * all of them resolve to `[error, data]`.
 *
 * @example
 * const gamma = new GammaClient();
 * const [err, tag] = await gamma.tagBySlug('politics');
 * if (err?.kind === 'status' && err.notFound) {
 *   // no such tag
 * }
 */
export class GammaClient extends RequestClient {
  /**
   * @throws {ConfigurationError} when `host` is not an absolute URL.
   */
  constructor({ host = DEFAULT_HOST, ...props }: GammaClientProps = {}) {
    super({ host, ...props });
  }

  /** Lists teams, filtered by `request`. */
  teams(request: ListTeamsRequest = {}, opts?: RequestOptions): SafeWrapAsync<GammaClientError, ListTeamsResponse> {
    return this.request(gammaEndpoints.teams, { $search: request }, opts);
  }

  /** Lists sports with their display and resolution metadata. */
  sports(opts?: RequestOptions): SafeWrapAsync<GammaClientError, SportsMetadataResponse> {
    return this.request(gammaEndpoints.sports, {}, opts);
  }

  /** Lists the market types sports markets can have. */
  sportsMarketTypes(opts?: RequestOptions): SafeWrapAsync<GammaClientError, SportsMarketTypesResponse> {
    return this.request(gammaEndpoints.sportsMarketTypes, {}, opts);
  }

  /** Lists tags, filtered by `request`. */
  tags(request: TagsRequest = {}, opts?: RequestOptions): SafeWrapAsync<GammaClientError, Tag[]> {
    return this.request(gammaEndpoints.tags, { $search: request }, opts);
  }

  /** Fetches one tag by numeric id. */
  tagById(id: number, includeTemplate?: boolean, opts?: RequestOptions): SafeWrapAsync<GammaClientError, Tag> {
    return this.request(gammaEndpoints.tagById, { $path: { id }, $search: { includeTemplate } }, opts);
  }

  /** Fetches one tag by slug; the slug is percent-encoded into the path. */
  tagBySlug(slug: string, includeTemplate?: boolean, opts?: RequestOptions): SafeWrapAsync<GammaClientError, Tag> {
    return this.request(gammaEndpoints.tagBySlug, { $path: { slug }, $search: { includeTemplate } }, opts);
  }

  /** Lists the relationship edges of the tag with the given id. */
  tagRelationshipsById(
    { id, ...filter }: RelatedTagsByIdRequest,
    opts?: RequestOptions,
  ): SafeWrapAsync<GammaClientError, TagRelationship[]> {
    return this.request(gammaEndpoints.tagRelationshipsById, { $path: { id }, $search: filter }, opts);
  }

  /** Lists the relationship edges of the tag with the given slug. */
  tagRelationshipsBySlug(
    { slug, ...filter }: RelatedTagsBySlugRequest,
    opts?: RequestOptions,
  ): SafeWrapAsync<GammaClientError, TagRelationship[]> {
    return this.request(gammaEndpoints.tagRelationshipsBySlug, { $path: { slug }, $search: filter }, opts);
  }

  /** Lists the tags related to the tag with the given id, resolved to full tag objects. */
  relatedTagsById({ id, ...filter }: RelatedTagsByIdRequest, opts?: RequestOptions): SafeWrapAsync<GammaClientError, Tag[]> {
    return this.request(gammaEndpoints.relatedTagsById, { $path: { id }, $search: filter }, opts);
  }

  /** Lists the tags related to the tag with the given slug, resolved to full tag objects. */
  relatedTagsBySlug(
    { slug, ...filter }: RelatedTagsBySlugRequest,
    opts?: RequestOptions,
  ): SafeWrapAsync<GammaClientError, Tag[]> {
    return this.request(gammaEndpoints.relatedTagsBySlug, { $path: { slug }, $search: filter }, opts);
  }
}
