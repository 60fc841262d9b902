// The package entry point runs a self-test when it has no parent module, which
// is the case under ESM; the library file exports the same function.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf from "pdf-parse";
  export default pdf;
}
