import "dotenv/config";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { connectDatabase } from "./db/connect.js";
import { mongoCatalog } from "./services/catalog.js";
import { createServices } from "./services/index.js";
import { enqueueOrderStatusNotification } from "./services/notificationQueue.js";
import { createSimulatedAuthorizer } from "./services/paymentSimulator.js";
import { createMongoStore } from "./store/mongoStore.js";

await connectDatabase();

const services = createServices({
  store: createMongoStore(),
  catalog: mongoCatalog,
  authorizer: createSimulatedAuthorizer({
    mode: env.PAYMENT_SIMULATION_MODE,
    approvalLimit: env.PAYMENT_APPROVAL_LIMIT
  }),
  notify: enqueueOrderStatusNotification,
  currency: env.STORE_CURRENCY
});

const app = createApp(services);
app.listen(env.PORT, () => {
  console.log(`[api] running on http://localhost:${env.PORT} (payments: ${env.PAYMENT_SIMULATION_MODE})`);
});
