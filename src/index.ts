import { main } from "./app/main.js";

main().catch((err: unknown) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
