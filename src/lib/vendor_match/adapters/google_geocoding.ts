import { z } from "zod";
import { ProviderHttpError, TransientProviderError } from "../errors";
import type { BoundingBox, GeocodingAdapter } from "../types";

const GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";

const PointSchema = z.object({ lat: z.number(), lng: z.number() });

const GeocodeResponseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        geometry: z.object({
          viewport: z.object({ northeast: PointSchema, southwest: PointSchema }).optional(),
          bounds: z.object({ northeast: PointSchema, southwest: PointSchema }).optional(),
        }),
      })
    )
    .default([]),
});

export type GoogleGeocodingOptions = {
  api_key: string;
  fetch_impl?: typeof fetch;
};

/** Resolves a free-text location to the viewport rectangle of its first match. */
export class GoogleGeocodingAdapter implements GeocodingAdapter {
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GoogleGeocodingOptions) {
    this.apiKey = options.api_key;
    this.fetchImpl = options.fetch_impl ?? fetch;
  }

  async resolve(location: string): Promise<BoundingBox | null> {
    if (!location.trim()) return null;
    const url = `${GEOCODE_URL}?address=${encodeURIComponent(location)}&key=${encodeURIComponent(this.apiKey)}`;
    const response = await this.fetchImpl(url);
    const body = await response.text();
    if (response.status >= 500) {
      throw new TransientProviderError("collector", `geocoding returned ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new ProviderHttpError("geocoding", response.status, body);
    }

    const parsed = GeocodeResponseSchema.safeParse(JSON.parse(body));
    if (!parsed.success || parsed.data.status !== "OK") return null;

    const geometry = parsed.data.results[0]?.geometry;
    const box = geometry?.viewport ?? geometry?.bounds;
    if (!box) return null;
    return {
      low: { latitude: box.southwest.lat, longitude: box.southwest.lng },
      high: { latitude: box.northeast.lat, longitude: box.northeast.lng },
    };
  }
}
