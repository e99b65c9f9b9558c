export {
  materializeRows,
  hydrateRows,
  resultKeys,
  type CollisionPolicy,
} from './materializer';
