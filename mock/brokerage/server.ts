/**
 * Runs the mock brokerage on MOCK_BROKERAGE_PORT for local development.
 * Point BROKER_BASE_URL and BROKER_CHART_URL at the printed addresses.
 */

import { MockBrokerage } from "./app.js";

const PORT = parseInt(process.env.MOCK_BROKERAGE_PORT ?? "3001", 10);

const mock = new MockBrokerage({
  username: process.env.BROKER_USERNAME ?? "test-user",
  password: process.env.BROKER_PASSWORD ?? "test-secret",
});
mock.setBaseUrl(`http://localhost:${PORT}/`);

mock.app.listen(PORT, () => {
  console.log(`\n  Mock brokerage running at http://localhost:${PORT}/`);
  console.log(`  BROKER_BASE_URL=http://localhost:${PORT}/`);
  console.log(`  BROKER_CHART_URL=${mock.chartUrl}\n`);
});
