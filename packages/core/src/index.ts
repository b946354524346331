export * from "./types/subtitle";
export * from "./types/translation";
export * from "./srt/parse-srt";
export * from "./srt/format-srt";
export * from "./utils/sentences";
export * from "./utils/protect-terms";
export * from "./utils/line-wrap";
export * from "./align/batch-translate";
export * from "./align/reassemble-blocks";
export * from "./pipeline/realign-subtitles";
export * from "./provisioning/ensure-model";
