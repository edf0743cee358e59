import type { CommandContext, CommandResponse } from "../commandTypes.js";
import { fmtHelp } from "../ui/format.js";

export default async function handleHelpCommand(
  params: string[],
  rawParams: string,
  ctx: CommandContext,
): Promise<CommandResponse> {
  return { response: fmtHelp(params[0]?.toLowerCase()) };
}
