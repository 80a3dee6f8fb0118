// The package entry runs a self-test when loaded as an ES module; the library
// file underneath has the same export.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf from "pdf-parse";
  export default pdf;
}
