import assert from "node:assert/strict";
import test from "node:test";
import { parseMessageDate } from "./dates.js";

test("RFC 5322 dates are converted to UTC", () => {
  assert.equal(parseMessageDate("Mon, 17 Apr 2006 08:09:02 +0300"), "2006-04-17 05:09:02");
  assert.equal(parseMessageDate("Tue, 1 Jan 2002 23:30:00 -0500"), "2002-01-02 04:30:00");
  assert.equal(parseMessageDate("Fri, 3 Mar 95 10:00:00 PST"), "1995-03-03 18:00:00");
});

test("obsolete RFC 5322 forms are accepted", () => {
  assert.equal(parseMessageDate("Apr 17 2006 08:09:02 GMT"), "2006-04-17 08:09:02");
  assert.equal(parseMessageDate("Monday, 04-Jan-93 13:22:13 GMT"), "1993-01-04 13:22:13");
  assert.equal(parseMessageDate("17 Apr 2006 08:09:02+0300"), "2006-04-17 05:09:02");
});

test("an unknown zone is taken as UTC", () => {
  assert.equal(parseMessageDate("Thu, 5 Sep 2024 12:00:00 -0000"), "2024-09-05 12:00:00");
});

test("an impossible offset is replaced by UTC", () => {
  assert.equal(parseMessageDate("Mon, 27 Dec 1993 13:46:36 +22306256"), "1993-12-27 13:46:36");
});

test("legacy numeric layouts are parsed as UTC", () => {
  assert.equal(parseMessageDate("04-Jan-93 13:22:13"), "1993-01-04 13:22:13");
  assert.equal(parseMessageDate("30-Nov-93 17:23"), "1993-11-30 17:23:00");
  assert.equal(parseMessageDate("2006-07-29 00:55:01"), "2006-07-29 00:55:01");
});

test("unpadded times are repaired", () => {
  assert.equal(parseMessageDate("Mon, 17 Apr 2006  8: 9: 2 +0300"), "2006-04-17 05:09:02");
});

test("unrecognized or impossible dates are absent", () => {
  assert.equal(parseMessageDate("sometime last week"), null);
  assert.equal(parseMessageDate("Fri, 30 Feb 2001 10:00:00 +0000"), null);
  assert.equal(parseMessageDate(""), null);
  assert.equal(parseMessageDate(undefined), null);
});
