// The toml package ships no type declarations.
declare module "toml" {
  export function parse(input: string): unknown;
}
