import type { ConfigProvider } from "../config/provider.js";
import type { OptionsHandleTable } from "../state/handle-table.js";

export interface HandlerDeps {
  config: ConfigProvider;
  handles: OptionsHandleTable;
  log: (message: string) => void;
}
