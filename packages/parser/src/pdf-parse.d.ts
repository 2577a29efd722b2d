// The package root runs a debug harness when loaded as ESM; the library entry does not.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf from "pdf-parse";
  export default pdf;
}
