import { z } from "zod";
import { TileSourceConfigError } from "../config";
import { tileGridSizeAtZoom, type TileIdentity } from "../coords";

export const urlTemplateSchema = z
  .string()
  .trim()
  .min(1, "URL template is required")
  .refine((value) => value.includes("{z}"), "URL template needs a {z} placeholder")
  .refine((value) => value.includes("{x}"), "URL template needs an {x} placeholder")
  .refine((value) => value.includes("{y}") || value.includes("{-y}"), "URL template needs a {y} or {-y} placeholder");

export function parseUrlTemplate(template: string): string {
  const parsed = urlTemplateSchema.safeParse(template);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new TileSourceConfigError(`Invalid URL template ${JSON.stringify(template)}: ${reason}`);
  }
  return parsed.data;
}

export function assertSubdomainsFor(templates: readonly string[], subdomains: readonly string[]) {
  const needing = templates.find((template) => template.includes("{s}"));
  if (needing === undefined) return;
  if (subdomains.length === 0 || subdomains.some((subdomain) => subdomain.trim() === "")) {
    throw new TileSourceConfigError(`URL template ${JSON.stringify(needing)} uses {s} but no subdomains were given`);
  }
}

export function pickSubdomain(tile: TileIdentity, subdomains: readonly string[]) {
  if (subdomains.length === 0) return "";
  return subdomains[(tile.x + tile.y) % subdomains.length];
}

export function expandTileUrl(template: string, tile: TileIdentity, subdomains: readonly string[] = []) {
  const flippedY = tileGridSizeAtZoom(tile.zoom) - 1 - tile.y;
  return template
    .replaceAll("{z}", String(tile.zoom))
    .replaceAll("{x}", String(tile.x))
    .replaceAll("{-y}", String(flippedY))
    .replaceAll("{y}", String(tile.y))
    .replaceAll("{s}", pickSubdomain(tile, subdomains));
}
