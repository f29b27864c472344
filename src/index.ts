export * from "./util.js";
export * from "./vec.js";
export * from "./grid.js";
export * from "./priority_queue.js";
export * from "./direction.js";
export * from "./route_finder.js";
export * from "./link_router.js";
export * from "./label_placer.js";
export * from "./topology_parse.js";
export * from "./graphml_parse.js";
export * from "./color_scale.js";
export * from "./config.js";
export { renderSvg, renderScale, renderArrow, findSplit, defaultSplit, PathBuilder } from "./render_svg.js";
export { makeMap, parseArgs, isGraphml, type CliOptions, type MapResult } from "./main.js";
