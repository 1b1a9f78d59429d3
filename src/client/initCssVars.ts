import { BASE_FONT_SIZE, HEADING_SCALES, LIST_INDENT_PX } from "../shared/constants";

export function initCssVars(): void {
  const root = document.documentElement.style;
  root.setProperty("--base-font-size", `${BASE_FONT_SIZE}px`);
  root.setProperty("--list-indent", `${LIST_INDENT_PX}px`);
  HEADING_SCALES.forEach((scale, i) => {
    root.setProperty(`--heading-${i + 1}-scale`, String(scale));
  });
}
