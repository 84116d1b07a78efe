import { createApp } from "./app";
import { log } from "./log";

const port = parseInt(process.env.PORT || "5000", 10);

createApp()
  .then(({ httpServer }) => {
    httpServer.listen(port, "0.0.0.0", () => {
      log(`serving on port ${port}`);
    });
  })
  .catch((error: unknown) => {
    console.error("[express] Failed to start server:", error);
    process.exit(1);
  });
