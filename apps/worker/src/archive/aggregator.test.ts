import assert from "node:assert/strict";
import test from "node:test";
import { FolderAggregator } from "./aggregator.js";

test("FolderAggregator tracks count and date range, ignoring undated messages", () => {
  const aggregator = new FolderAggregator("quic");
  aggregator.add({ date: "2019-03-04 10:00:00" });
  aggregator.add({ date: null });
  aggregator.add({ date: "2017-11-30 23:59:59" });
  aggregator.add({ date: "2021-01-01 00:00:00" });

  assert.deepEqual(aggregator.summary(), {
    mailingList: "quic",
    messageCount: 4,
    firstDate: "2017-11-30 23:59:59",
    lastDate: "2021-01-01 00:00:00"
  });
});

test("a folder with no dated messages reports an empty range", () => {
  const aggregator = new FolderAggregator("empty");
  aggregator.add({ date: null });
  assert.deepEqual(aggregator.summary(), {
    mailingList: "empty",
    messageCount: 1,
    firstDate: null,
    lastDate: null
  });
  assert.deepEqual(new FolderAggregator("none").summary(), {
    mailingList: "none",
    messageCount: 0,
    firstDate: null,
    lastDate: null
  });
});
