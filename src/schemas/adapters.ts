import { z } from 'zod';

const Priceish = z.union([z.number(), z.string()]).nullish();

/** `POST /search` body of the catalog search service, flat form. */
export const CatalogFlatResponse = z.object({
  results: z.array(
    z
      .object({
        id: z.union([z.string(), z.number()]).nullish(),
        product_id: z.union([z.string(), z.number()]).nullish(),
        title: z.string().nullish(),
        url: z.string().nullish(),
        price: Priceish,
        score: z.number().nullish(),
        distance: z.number().nullish(),
        document: z.string().nullish(),
      })
      .passthrough(),
  ),
});

const CatalogMetadata = z
  .object({
    product_id: z.union([z.string(), z.number()]).nullish(),
    title: z.string().nullish(),
    price: Priceish,
    url: z.string().nullish(),
  })
  .passthrough()
  .nullable();

/** Chroma-style batched query result: one inner array per query text. */
export const CatalogBatchedResponse = z.object({
  ids: z.array(z.array(z.string())),
  documents: z.array(z.array(z.string().nullable())).nullish(),
  metadatas: z.array(z.array(CatalogMetadata)).nullish(),
  distances: z.array(z.array(z.number())).nullish(),
});

export const TavilyResponse = z.object({
  results: z
    .array(
      z
        .object({
          title: z.string().nullish(),
          url: z.string(),
          content: z.string().nullish(),
          score: z.number().nullish(),
          price: Priceish,
        })
        .passthrough(),
    )
    .default([]),
});

const RainforestPrice = z.object({ value: z.union([z.number(), z.string()]).nullish() }).passthrough();

export const RainforestResponse = z.object({
  product: z
    .object({
      title: z.string().nullish(),
      price: RainforestPrice.nullish(),
      buybox_winner: z.object({ price: RainforestPrice.nullish() }).passthrough().nullish(),
    })
    .passthrough()
    .nullish(),
});

/** What the catalog collaborator hands back per hit, before adaptation. */
export type CatalogHit = {
  productId?: string;
  title?: string;
  url?: string;
  price?: unknown;
  score?: number;
  document?: string;
};

export type WebHit = {
  title?: string;
  url: string;
  snippet?: string;
  price?: unknown;
  score?: number;
};

export type PriceQuote = {
  title?: string;
  price?: number;
};

export interface CatalogSearchClient {
  search(queryText: string, topK: number, signal?: AbortSignal): Promise<CatalogHit[]>;
}

export interface WebSearchClient {
  search(queryText: string, allowedDomains: readonly string[], topK: number, signal?: AbortSignal): Promise<WebHit[]>;
}

export interface PriceLookupClient {
  lookup(itemCode: string, signal?: AbortSignal): Promise<PriceQuote | undefined>;
}
