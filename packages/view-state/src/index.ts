export { EDIT_SUBVIEWS, ConnectionSchema, ItemSchema } from "./types";
export type { Connection, EditSubview, Item } from "./types";
export {
  ViewState,
  connectionCodec,
  createViewStateCodec,
  editSubviewCodec,
  itemCodec,
  viewStateCodec,
  viewStateVariants,
} from "./viewState";
