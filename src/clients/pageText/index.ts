export { createPageTextFetcher } from "./pageTextClient";
