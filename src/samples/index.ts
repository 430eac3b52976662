export {
  buildSampleList,
  parseSampleList,
  splitListLine,
  type SampleList,
} from "./list-builder.js";
