import type { CommandHandler } from "../commandTypes.js";

import add from "./add.js";
import addTrueFalse from "./addTrueFalse.js";
import addTyped from "./addTyped.js";
import list from "./list.js";
import show from "./show.js";
import search from "./search.js";
import tags from "./tags.js";
import edit from "./edit.js";
import del from "./delete.js";
import due from "./due.js";
import forecast from "./forecast.js";
import study from "./study.js";
import next from "./next.js";
import answer from "./answer.js";
import skip from "./skip.js";
import end from "./end.js";
import stats from "./stats.js";
import streak from "./streak.js";
import importCmd from "./import.js";
import exportCmd from "./export.js";
import importJson from "./importJson.js";
import exportJson from "./exportJson.js";
import reset from "./reset.js";
import help from "./help.js";

export type { CommandHandler } from "../commandTypes.js";

export const commandRegistry: Record<string, CommandHandler> = {
  add,
  a: add,
  "add-tf": addTrueFalse,
  tf: addTrueFalse,
  "add-typed": addTyped,
  list,
  l: list,
  ls: list,
  show,
  view: show,
  search,
  find: search,
  tags,
  edit,
  e: edit,
  update: edit,
  delete: del,
  d: del,
  remove: del,
  rm: del,
  due,
  pending: due,
  forecast,
  study,
  practice: study,
  review: study,
  next,
  n: next,
  answer,
  ans: answer,
  skip,
  end,
  finish: end,
  stats,
  statistics: stats,
  streak,
  progress: streak,
  import: importCmd,
  export: exportCmd,
  "import-json": importJson,
  "export-json": exportJson,
  reset,
  help,
  h: help,
  commands: help,
};
