import { z } from 'zod';

// Responses. Optional wire fields are nullish, so an absent field and an explicit null stay distinct.

export const teamSchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  league: z.string().nullish(),
  record: z.string().nullish(),
  logo: z.string().nullish(),
  abbreviation: z.string().nullish(),
  alias: z.string().nullish(),
  createdAt: z.string().nullish(),
  updatedAt: z.string().nullish(),
});

export const listTeamsResponseSchema = z.array(teamSchema);

export const sportMetadataSchema = z.object({
  sport: z.string(),
  image: z.string().nullish(),
  resolution: z.string().nullish(),
  ordering: z.string().nullish(),
  /** Comma-separated tag ids */
  tags: z.string().nullish(),
  series: z.string().nullish(),
});

export const sportsMetadataResponseSchema = z.array(sportMetadataSchema);

export const sportsMarketTypesResponseSchema = z.object({
  marketTypes: z.array(z.string()),
});

export const tagSchema = z.object({
  id: z.string(),
  label: z.string().nullish(),
  slug: z.string().nullish(),
  forceShow: z.boolean().nullish(),
  forceHide: z.boolean().nullish(),
  isCarousel: z.boolean().nullish(),
  publishedAt: z.string().nullish(),
  createdBy: z.number().int().nullish(),
  updatedBy: z.number().int().nullish(),
  createdAt: z.string().nullish(),
  updatedAt: z.string().nullish(),
});

export const tagsResponseSchema = z.array(tagSchema);

export const tagRelationshipSchema = z.object({
  id: z.string(),
  tagID: z.number().int().nullish(),
  relatedTagID: z.number().int().nullish(),
  rank: z.number().int().nullish(),
});

export const tagRelationshipsResponseSchema = z.array(tagRelationshipSchema);

// Requests. Keys are camelCase here and snake_cased on the wire.

const count = z.number().int().nonnegative();

export const listTeamsRequestSchema = z
  .object({
    limit: count.optional(),
    offset: count.optional(),
    order: z.string().optional(),
    ascending: z.boolean().optional(),
    league: z.array(z.string()).optional(),
    name: z.array(z.string()).optional(),
    abbreviation: z.array(z.string()).optional(),
  })
  .strict();

export const tagsRequestSchema = z
  .object({
    limit: count.optional(),
    offset: count.optional(),
    order: z.string().optional(),
    ascending: z.boolean().optional(),
    includeTemplate: z.boolean().optional(),
    isCarousel: z.boolean().optional(),
  })
  .strict();

export const includeTemplateSchema = z.object({ includeTemplate: z.boolean().optional() }).strict();

export const relatedTagsStatusSchema = z.enum(['active', 'closed', 'all']);

export const relatedTagsFilterSchema = z
  .object({
    omitEmpty: z.boolean().optional(),
    status: relatedTagsStatusSchema.optional(),
  })
  .strict();

export const tagIdPathSchema = z.object({ id: count });

export const tagSlugPathSchema = z.object({ slug: z.string().min(1) });

export type Team = z.output<typeof teamSchema>;
export type ListTeamsResponse = z.output<typeof listTeamsResponseSchema>;
export type SportMetadata = z.output<typeof sportMetadataSchema>;
export type SportsMetadataResponse = z.output<typeof sportsMetadataResponseSchema>;
export type SportsMarketTypesResponse = z.output<typeof sportsMarketTypesResponseSchema>;
export type Tag = z.output<typeof tagSchema>;
export type TagRelationship = z.output<typeof tagRelationshipSchema>;

export type ListTeamsRequest = z.input<typeof listTeamsRequestSchema>;
export type TagsRequest = z.input<typeof tagsRequestSchema>;
export type RelatedTagsStatus = z.input<typeof relatedTagsStatusSchema>;
export type RelatedTagsFilter = z.input<typeof relatedTagsFilterSchema>;
export type RelatedTagsByIdRequest = z.input<typeof tagIdPathSchema> & RelatedTagsFilter;
export type RelatedTagsBySlugRequest = z.input<typeof tagSlugPathSchema> & RelatedTagsFilter;
