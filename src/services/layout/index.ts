export { type ColorMode, createPainter } from "./ansi.js"
export { type LayoutOptions, LogcatLayout, type RenderResult } from "./logcat-layout.js"
