import { createAccountsApp } from "./apps/accounts";
import { createCatalogApp } from "./apps/catalog";
import { createDeliveryApp } from "./apps/delivery";
import { config } from "./config/env";

const services = [
  { name: "Accounts API", app: createAccountsApp(), port: config.accountsPort },
  { name: "Catalog API", app: createCatalogApp(), port: config.catalogPort },
  { name: "Delivery API", app: createDeliveryApp(), port: config.deliveryPort },
];

for (const { name, app, port } of services) {
  app.listen(port, () => {
    console.log(`${name} running on port ${port}`);
  });
}
