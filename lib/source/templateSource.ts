import { TileSourceConfigError } from "../config";
import type { TileIdentity } from "../coords";
import { shortHash } from "../hashing";
import { assertSubdomainsFor, expandTileUrl, parseUrlTemplate } from "./urlTemplate";
import { WebTileSource, type WebTileSourceOptions } from "./webTileSource";

type TemplateSourceOptions = Omit<WebTileSourceOptions, "cacheKey"> & {
  cacheKey?: string;
  subdomains?: string[];
};

export type TemplateTileSourceOptions = TemplateSourceOptions & {
  urlTemplate: string;
};

export type CompositeTileSourceOptions = TemplateSourceOptions & {
  /** Bottom layer first. */
  urlTemplates: string[];
};

/** Single-layer source addressed by a `{z}/{x}/{y}` style URL template. */
export class TemplateTileSource extends WebTileSource {
  readonly urlTemplate: string;
  private readonly subdomains: string[];

  constructor(options: TemplateTileSourceOptions) {
    const urlTemplate = parseUrlTemplate(options.urlTemplate);
    assertSubdomainsFor([urlTemplate], options.subdomains ?? []);
    super({ ...options, cacheKey: options.cacheKey ?? `template-${shortHash([urlTemplate])}` });
    this.urlTemplate = urlTemplate;
    this.subdomains = [...(options.subdomains ?? [])];
  }

  protected override urlForTile(tile: TileIdentity): string {
    return expandTileUrl(this.urlTemplate, tile, this.subdomains);
  }
}

/** Stacks several templated layers into one tile, e.g. imagery plus labels. */
export class CompositeTileSource extends WebTileSource {
  readonly urlTemplates: readonly string[];
  private readonly subdomains: string[];

  constructor(options: CompositeTileSourceOptions) {
    if (options.urlTemplates.length === 0) {
      throw new TileSourceConfigError("Composite tile source needs at least one URL template");
    }
    const urlTemplates = options.urlTemplates.map(parseUrlTemplate);
    assertSubdomainsFor(urlTemplates, options.subdomains ?? []);
    super({ ...options, cacheKey: options.cacheKey ?? `composite-${shortHash(urlTemplates)}` });
    this.urlTemplates = urlTemplates;
    this.subdomains = [...(options.subdomains ?? [])];
  }

  override urlsForTile(tile: TileIdentity): string[] {
    return this.urlTemplates.map((template) => expandTileUrl(template, tile, this.subdomains));
  }
}
