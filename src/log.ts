import createDebug from "debug";

// Enable with DEBUG=eyemap:*
export const log = {
  generator: createDebug("eyemap:generator"),
  processor: createDebug("eyemap:processor"),
  render: createDebug("eyemap:render"),
  cache: createDebug("eyemap:cache"),
  output: createDebug("eyemap:output"),
};
