import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import placeDetailSchema from "./place_detail.schema.json";
import type { PlaceDetail } from "../types";

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
addFormats(ajv);

export const validatePlaceDetail: ValidateFunction<PlaceDetail> = ajv.compile<PlaceDetail>(placeDetailSchema);

export function describeSchemaErrors(validate: ValidateFunction): string {
  return validate.errors?.map((e) => `${e.instancePath || "/"} ${e.message ?? "invalid"}`).join("; ") ?? "unknown";
}
