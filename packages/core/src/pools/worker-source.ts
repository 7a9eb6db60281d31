// Scripts evaluated inside pool workers. Plain CommonJS JavaScript: worker
// threads run them with `eval: true`, child processes with `node -e`.
//
// A task carries the function's source text; the worker compiles it once per
// distinct source and calls it with the task's arguments.

const RUNNER = `
const compiled = new Map();

// Bundlers that keep function names inject __name() calls into function
// sources; give them an identity to call.
function compile(source) {
  let fn = compiled.get(source);
  if (!fn) {
    fn = new Function("require", "__name", "return (" + source + ");")(require, (target) => target);
    if (typeof fn !== "function") throw new TypeError("Task source did not evaluate to a function");
    compiled.set(source, fn);
  }
  return fn;
}

function serializeError(error) {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "Error", message: String(error) };
}

async function run(task) {
  try {
    const value = await compile(task.source)(...task.args);
    return { id: task.id, ok: true, value };
  } catch (error) {
    return { id: task.id, ok: false, error: serializeError(error) };
  }
}

function reply(send, message) {
  try {
    send(message);
  } catch (error) {
    send({ id: message.id, ok: false, error: serializeError(error) });
  }
}
`;

export const THREAD_WORKER_SOURCE = `
const { parentPort } = require("node:worker_threads");
${RUNNER}
parentPort.on("message", (task) => {
  run(task).then((message) => reply((m) => parentPort.postMessage(m), message));
});
`;

export const PROCESS_WORKER_SOURCE = `
${RUNNER}
process.on("message", (task) => {
  run(task).then((message) => reply((m) => process.send(m), message));
});
process.on("disconnect", () => process.exit(0));
`;
