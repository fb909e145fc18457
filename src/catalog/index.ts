export {
  loadCatalog,
  loadCatalogFromFile,
  loadCatalogFromDb,
  CatalogLoadError,
} from "./loader";
