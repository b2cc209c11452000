import { z } from "zod";
import { MalformedUpstreamResponseError, ProviderHttpError, TransientProviderError } from "../errors";
import type { BoundingBox, PlaceDetail, PlaceSearchAdapter, PlaceSummary } from "../types";

const PLACES_BASE_URL = "https://places.googleapis.com/v1";
const SEARCH_FIELD_MASK = "places.id,places.displayName";
const DETAIL_FIELD_MASK =
  "id,displayName,primaryType,types,formattedAddress,nationalPhoneNumber,websiteUri,rating,userRatingCount,reviews";

const SearchResponseSchema = z.object({
  places: z
    .array(
      z.object({
        id: z.string(),
        displayName: z.object({ text: z.string() }).optional(),
      })
    )
    .optional(),
});

const PlaceResponseSchema = z.object({
  id: z.string(),
  displayName: z.object({ text: z.string() }).optional(),
  primaryType: z.string().optional(),
  types: z.array(z.string()).optional(),
  formattedAddress: z.string().optional(),
  nationalPhoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  rating: z.number().optional(),
  userRatingCount: z.number().optional(),
  reviews: z
    .array(
      z.object({
        text: z.object({ text: z.string() }).optional(),
        originalText: z.object({ text: z.string() }).optional(),
      })
    )
    .optional(),
});

export type PlaceResponse = z.infer<typeof PlaceResponseSchema>;

export function mapPlaceResponse(place: PlaceResponse): PlaceDetail {
  const reviews = (place.reviews ?? [])
    .map((review) => review.text?.text ?? review.originalText?.text ?? "")
    .filter((text) => text.trim().length > 0);
  return {
    id: place.id,
    name: place.displayName?.text ?? "",
    primary_type: place.primaryType ?? null,
    types: place.types ?? [],
    address: place.formattedAddress ?? null,
    phone: place.nationalPhoneNumber ?? null,
    website: place.websiteUri ?? null,
    rating: place.rating ?? null,
    rating_count: Math.max(0, Math.round(place.userRatingCount ?? 0)),
    reviews,
  };
}

export type GooglePlacesOptions = {
  api_key: string;
  fetch_impl?: typeof fetch;
};

export class GooglePlacesAdapter implements PlaceSearchAdapter {
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GooglePlacesOptions) {
    this.apiKey = options.api_key;
    this.fetchImpl = options.fetch_impl ?? fetch;
  }

  private async readJson(response: Response): Promise<unknown> {
    const body = await response.text();
    if (response.status >= 500) {
      throw new TransientProviderError("collector", `places returned ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new ProviderHttpError("places", response.status, body);
    }
    try {
      return JSON.parse(body);
    } catch {
      throw new MalformedUpstreamResponseError("collector", "places response is not JSON", body);
    }
  }

  async search(query: string, bounds: BoundingBox): Promise<PlaceSummary[]> {
    const response = await this.fetchImpl(`${PLACES_BASE_URL}/places:searchText`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Goog-Api-Key": this.apiKey,
        "X-Goog-FieldMask": SEARCH_FIELD_MASK,
      },
      body: JSON.stringify({
        textQuery: query,
        locationBias: { rectangle: bounds },
      }),
    });
    const parsed = SearchResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new MalformedUpstreamResponseError("collector", "unexpected places search payload");
    }
    return (parsed.data.places ?? []).map((place) => ({ id: place.id, name: place.displayName?.text }));
  }

  async getDetails(id: string): Promise<PlaceDetail> {
    const response = await this.fetchImpl(`${PLACES_BASE_URL}/places/${encodeURIComponent(id)}`, {
      method: "GET",
      headers: {
        "Content-Type": "application/json",
        "X-Goog-Api-Key": this.apiKey,
        "X-Goog-FieldMask": DETAIL_FIELD_MASK,
      },
    });
    const parsed = PlaceResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new MalformedUpstreamResponseError("collector", `unexpected place detail payload for ${id}`);
    }
    return mapPlaceResponse(parsed.data);
  }
}
