import {
  arrayOf,
  defineVariantCodec,
  fromZod,
  nullable,
  single,
  stringEnum,
  tuple,
  unit,
  uuidCodec,
  type CodecOptions,
  type VariantCodec,
  type VariantValue,
} from "@keyed-union/codec";
import { ConnectionSchema, EDIT_SUBVIEWS, ItemSchema, type Connection, type EditSubview, type Item } from "./types";

export const editSubviewCodec = stringEnum("EditSubview", EDIT_SUBVIEWS);
export const itemCodec = fromZod("Item", ItemSchema);
export const connectionCodec = fromZod("Connection", ConnectionSchema);

export const viewStateVariants = {
  empty: unit(),
  editing: single(editSubviewCodec),
  exchangeHistory: single(nullable(connectionCodec)),
  list: tuple(uuidCodec, arrayOf(itemCodec)),
};

export type ViewState = VariantValue<typeof viewStateVariants>;

export const ViewState = {
  empty: (): ViewState => ({ type: "empty" }),
  editing: (subview: EditSubview): ViewState => ({ type: "editing", data: subview }),
  exchangeHistory: (connection: Connection | null): ViewState => ({ type: "exchangeHistory", data: connection }),
  list: (selectedId: string, expandedItems: Item[]): ViewState => ({
    type: "list",
    data: [selectedId, expandedItems],
  }),
};

export function createViewStateCodec(options?: CodecOptions): VariantCodec<ViewState> {
  return defineVariantCodec("ViewState", viewStateVariants, options);
}

export const viewStateCodec = createViewStateCodec();
