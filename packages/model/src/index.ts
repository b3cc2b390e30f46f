export {
  type LayerParams,
  type MlpParams,
  type BoundLayer,
  type BoundMLP,
  layerSizes,
  initMLP,
  bindParams,
  mlpForward,
  collectParamEntries,
  collectParams,
  countParams,
  predict,
} from "./mlp.js";
