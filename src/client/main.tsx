import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import { App } from "./App";
import { initCssVars } from "./initCssVars";
import "./styles.css";

// Heading scales and list indent come from shared constants, not the stylesheet.
initCssVars();

const mountPoint = document.getElementById("root");
if (!mountPoint) throw new Error("Mount point #root not found in index.html.");
createRoot(mountPoint).render(
  <StrictMode>
    <App />
  </StrictMode>
);
