// Types for the parser module loaded directly by src/documents; they are the
// same ones @types/pdf-parse gives the package entry point.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}
