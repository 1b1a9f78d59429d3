import { createApp } from "./app";
import { DEFAULT_SERVER_PORT } from "../shared/constants";

const PORT = Number(process.env.PORT ?? DEFAULT_SERVER_PORT);

createApp().listen(PORT, () => {
  console.log(`[notes] Server running on http://localhost:${PORT}`);
});
