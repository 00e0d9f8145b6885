type Dated = {
  created_at: Date;
  commit_time: Date | null;
};

export function serializeResult<T extends Dated>(result: T) {
  return {
    ...result,
    created_at: result.created_at.toISOString(),
    commit_time: result.commit_time ? result.commit_time.toISOString() : null
  };
}
