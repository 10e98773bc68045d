import { MAX_SAMPLE_CAP } from "./config.js";

export const MAX_PAGE_LIMIT = 100;

const nameParams = {
  type: "object" as const,
  required: ["name"],
  properties: {
    name: { type: "string" as const, minLength: 1, pattern: "\\S" },
  },
};

export const listMoviesSchema = {
  querystring: {
    type: "object" as const,
    properties: {
      page: { type: "integer" as const, minimum: 1 },
      limit: { type: "integer" as const, minimum: 1, maximum: MAX_PAGE_LIMIT },
    },
  },
};

export const searchMoviesSchema = {
  querystring: {
    type: "object" as const,
    properties: {
      name: { type: "string" as const, minLength: 1, pattern: "\\S" },
      actor: { type: "string" as const, minLength: 1, pattern: "\\S" },
    },
  },
};

export const updateMovieSchema = {
  params: nameParams,
  body: {
    type: "object" as const,
  },
};

export const commonMoviesSchema = {
  querystring: {
    type: "object" as const,
    properties: {
      sample: { type: "integer" as const, minimum: 1, maximum: MAX_SAMPLE_CAP },
    },
  },
};

export const movieUsersSchema = {
  params: nameParams,
};

export const userRatingsSchema = {
  params: nameParams,
};
