import { acceleratorsFromConfig, type AcceleratorTable } from "./capabilities";
import { defaultConvertConfig, type ConvertConfig } from "./config";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import { TABULAR_ENGINES, type TabularEngine } from "./tabular";
import { serialize } from "./toon";
import { asFlatRecordSet, type FlatRecordSet, type ToonValue } from "./value";

const log = createLogger("engine");

export const BaselineReason = {
  NoSizeProxy: "no-size-proxy",
  BelowThreshold: "below-threshold",
  NotTabular: "not-tabular",
  NoAccelerator: "no-accelerator",
} as const;

export type BaselineReason = typeof BaselineReason[keyof typeof BaselineReason];

export type EngineSelection =
  | { readonly engine: "baseline"; readonly reason: BaselineReason; readonly advisory?: string }
  | { readonly engine: "tabular"; readonly tabular: TabularEngine; readonly records: FlatRecordSet };

export interface SelectionInput {
  value: ToonValue;
  /** Approximate record count; absent for sources without a cheap row estimate. */
  sizeProxy?: number;
  accelerators: AcceleratorTable;
  config: Pick<ConvertConfig, "threshold" | "advisories">;
}

export const ACCELERATOR_ADVISORY =
  `Large tabular input is being rendered by the baseline engine because no tabular engine is enabled. ` +
  `Enable one (${TABULAR_ENGINES.map((engine) => engine.name).join(", ")}) for faster conversion.`;

/**
 * Picks the engine for one conversion. Pure: the same input always yields the same choice.
 *
 * Inputs below the threshold always use the baseline engine; at or above it, the first enabled
 * tabular engine in priority order wins when the value is a flat record set.
 */
export const selectEngine = ({ value, sizeProxy, accelerators, config }: SelectionInput): EngineSelection => {
  if (sizeProxy === undefined) return { engine: "baseline", reason: BaselineReason.NoSizeProxy };
  if (sizeProxy < config.threshold) return { engine: "baseline", reason: BaselineReason.BelowThreshold };

  const records = asFlatRecordSet(value);
  if (records === undefined) return { engine: "baseline", reason: BaselineReason.NotTabular };

  const tabular = TABULAR_ENGINES.find((engine) => accelerators[engine.name] === true);
  if (tabular) return { engine: "tabular", tabular, records };

  return config.advisories
    ? { engine: "baseline", reason: BaselineReason.NoAccelerator, advisory: ACCELERATOR_ADVISORY }
    : { engine: "baseline", reason: BaselineReason.NoAccelerator };
};

/** Emits each distinct advisory once per board. */
export interface NoticeBoard {
  notify(message: string): void;
}

export const createNoticeBoard = (sink: (message: string) => void): NoticeBoard => {
  const shown = new Set<string>();
  return {
    notify(message) {
      if (shown.has(message)) return;
      shown.add(message);
      sink(message);
    },
  };
};

export interface RenderOptions {
  sizeProxy?: number;
  /** Defaults to the accelerators the configuration enables. */
  accelerators?: AcceleratorTable;
  config?: ConvertConfig;
  notices?: NoticeBoard;
}

/**
 * Renders a value with the engine {@link selectEngine} picks. A tabular engine failure is
 * logged and rethrown; the baseline engine is never tried as a fallback.
 */
export const renderToon = (value: ToonValue, options: RenderOptions = {}): string => {
  const config = options.config ?? defaultConvertConfig;
  const accelerators = options.accelerators ?? acceleratorsFromConfig(config);
  const selection = selectEngine({ value, sizeProxy: options.sizeProxy, accelerators, config });

  if (selection.engine === "baseline") {
    log("baseline engine (%s, size proxy %s)", selection.reason, options.sizeProxy ?? "n/a");
    if (selection.advisory !== undefined) options.notices?.notify(selection.advisory);
    return serialize(value, config.indent);
  }

  const { tabular, records } = selection;
  log("%s engine for %d records (size proxy %d)", tabular.name, records.rows.length, options.sizeProxy);
  try {
    return tabular.serialize(records, config.indent);
  } catch (error) {
    log("%s engine failed on %d records: %s", tabular.name, records.rows.length, describeError(error));
    throw error;
  }
};
