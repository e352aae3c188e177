export interface CliArguments {
  command?: string;
  rest: string[];
}
