/**
 * @spritekin/content-town: townsfolk templates drawn with the LPC
 * medieval fantasy character sheets.
 */

import { fileURLToPath } from "node:url";
import type { AssetSizeProvider } from "@spritekin/core";
import { parseEntityDocument } from "@spritekin/loader";
import type { EntityDocument } from "@spritekin/schema";
import entities from "./entities.json";

/** Absolute path of `entities.json`, for tools that load documents from disk. */
export const TOWN_DOCUMENT_PATH = fileURLToPath(new URL("./entities.json", import.meta.url));

export const townDocument: EntityDocument = parseEntityDocument(entities, "content-town/entities.json");

export const TOWN_TEMPLATES = ["human", "town_guard", "player", "cursor"] as const;
export type TownTemplate = (typeof TOWN_TEMPLATES)[number];

/** Sheet rows of the walk cycle, top to bottom. */
export const TOWN_DIRECTIONS = ["north", "west", "south", "east"] as const;

export const STATIONARY_STATES = TOWN_DIRECTIONS.map((d) => `stationary_${d}`);
export const MOVING_STATES = TOWN_DIRECTIONS.map((d) => `moving_${d}`);
export const DEAD_STATES = TOWN_DIRECTIONS.map((d) => `dead_${d}`);

const SHEET_SIZES: Readonly<Record<string, { readonly width: number; readonly height: number }>> = {
  walkcycle: { width: 576, height: 256 },
  hurt: { width: 384, height: 64 },
};

/** Sizes of the LPC sheets, known per animation folder. */
export const townSheetSizes: AssetSizeProvider = {
  sizeOf(asset) {
    const folder = asset.split("/").at(-2);
    return folder === undefined ? undefined : SHEET_SIZES[folder];
  },
};
