export { similarity, percentileRank, percentileRanks } from './similarity';
export {
  buildTree,
  createTree,
  collectLeaves,
  internalNode,
  leafNode,
  pathPhrase,
} from './taxonomy-tree';
export { greedyMatch } from './greedy-match';
export { bestLeaf } from './best-leaf';
export { multiMatch, combinedScore } from './multi-match';
