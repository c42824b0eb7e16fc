/**
 * Steps of building a pull request through the git object graph. `Failed` is
 * terminal and is carried by `PublishError`.
 */
export type PublishState =
  | 'RequestOpened'
  | 'CommitCreated'
  | 'BaseResolved'
  | 'BlobsCreated'
  | 'TreeCreated'
  | 'RefUpdated'
  | 'Failed'
  | 'Idle'
