/**
 * Settings unit: owns the tracked-asset list.
 * Mutations are sequential so concurrent add/delete requests never interleave.
 */

import { SettingsStore } from "../storage/settings.js";
import type { Handlers, Unit, UnitContext } from "./supervisor.js";
import type { Protocols, SettingsProtocol } from "../types/units.js";

export class SettingsUnit implements Unit<SettingsProtocol, Protocols> {
  readonly handlers: Handlers<SettingsProtocol, UnitContext<Protocols>>;

  constructor(dataDir: string) {
    const store = new SettingsStore(dataDir);

    this.handlers = {
      get_assets: { mode: "concurrent", handle: () => store.assets() },
      get_defaults: { mode: "concurrent", handle: () => ({ ...store.current.calculator }) },
      add_asset: { mode: "sequential", handle: (asset) => store.addAsset(asset) },
      delete_asset: { mode: "sequential", handle: ({ id }) => store.deleteAsset(id) },
    };
  }
}
