import type { WalkStrategy } from "../types.js";
import { graphqlWalker } from "./graphql.js";
import { restWalker } from "./rest.js";
import type { CommentWalker } from "./types.js";

export { walkGraphql, graphqlWalker } from "./graphql.js";
export { walkRest, restWalker } from "./rest.js";
export type { CommentWalker, WalkDependencies } from "./types.js";

const WALKERS: Record<WalkStrategy, CommentWalker> = {
  graphql: graphqlWalker,
  rest: restWalker,
};

export function getWalker(strategy: WalkStrategy): CommentWalker {
  return WALKERS[strategy];
}
