/* eslint-disable @typescript-eslint/no-unsafe-member-access */
import { describe, test, expect, beforeEach, afterEach } from "vitest";
import type { Application } from "express";
import request, { type Response as SupertestResponse } from "supertest";
import { createHttpApi } from "../../http/app.js";
import { RoundService } from "../../round/service.js";
import type { Database } from "../../database/index.js";
import { DUMMY_LOGGER, createTestDatabase, testAddress } from "../utils.js";

// Typed version of supertest's Response
type Response<T> = Omit<SupertestResponse, "body"> & { body: T };

const ADMIN = testAddress(1);
const LEFTOVER = testAddress(2);

const VOTING_DEADLINE = 10_000;

const createRoundBody = {
  sender: ADMIN,
  funds: [{ denom: "ucosm", amount: "550000" }],
  id: "round-1",
  admin: ADMIN,
  leftoverAddress: LEFTOVER,
  proposalPeriod: { type: "atTime", time: 5_000 },
  votingPeriod: { type: "atTime", time: VOTING_DEADLINE },
  budgetDenom: "ucosm",
  algorithm: { type: "capitalConstrainedLiberalRadicalism" },
};

describe("server", () => {
  let db: Database;
  let now: number;
  let app: Application;

  beforeEach(async () => {
    db = await createTestDatabase();
    now = 1_000;

    app = createHttpApi({
      logger: DUMMY_LOGGER,
      port: 0,
      hostname: "dummy-hostname",
      buildTag: "123abc",
      databaseSchemaName: null,
      roundService: new RoundService({
        db,
        logger: DUMMY_LOGGER,
        now: () => now,
      }),
      enableSentry: false,
    }).app;
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe("/status", () => {
    test("responds with 200", async () => {
      const resp = await request(app).get("/api/v1/status");

      expect(resp.status).toEqual(200);
    });

    test("mentions hostname in body and header", async () => {
      const resp = await request(app).get("/api/v1/status");

      expect(resp.headers["x-machine-hostname"]).toEqual("dummy-hostname");
      expect(resp.body).toMatchObject({
        hostname: "dummy-hostname",
      });
    });

    test("mentions build tag in body and header", async () => {
      const resp = await request(app).get("/api/v1/status");

      expect(resp.headers["x-build-tag"]).toEqual("123abc");
      expect(resp.body).toMatchObject({
        buildTag: "123abc",
      });
    });
  });

  describe("/rounds", () => {
    test("creates a round", async () => {
      const resp = (await request(app)
        .post("/api/v1/rounds")
        .send(createRoundBody)) as Response<Record<string, unknown>>;

      expect(resp.status).toEqual(201);
      expect(resp.body).toEqual({
        id: "round-1",
        admin: ADMIN,
        leftoverAddress: LEFTOVER,
        createProposalWhitelist: null,
        voteProposalWhitelist: null,
        proposalPeriod: { type: "atTime", time: 5_000 },
        votingPeriod: { type: "atTime", time: VOTING_DEADLINE },
        budget: { denom: "ucosm", amount: "550000" },
        algorithm: {
          type: "capitalConstrainedLiberalRadicalism",
          parameter: "",
        },
        createdAt: "1970-01-01T00:00:01.000Z",
      });

      const fetched = await request(app).get("/api/v1/rounds/round-1");
      expect(fetched.status).toEqual(200);
      expect(fetched.body).toEqual(resp.body);
    });

    test("renders 400 for a malformed request", async () => {
      const resp = (await request(app)
        .post("/api/v1/rounds")
        .send({ ...createRoundBody, admin: "nobody" })) as Response<{
        error: string;
        issues: { path: (string | number)[]; message: string }[];
      }>;

      expect(resp.status).toEqual(400);
      expect(resp.body.error).toEqual("Invalid request");
      expect(resp.body.issues).toMatchObject([
        { path: ["admin"], message: "Invalid address: nobody" },
      ]);
    });

    test("renders 400 for an unknown algorithm", async () => {
      const resp = await request(app)
        .post("/api/v1/rounds")
        .send({ ...createRoundBody, algorithm: { type: "linearQf" } });

      expect(resp.status).toEqual(400);
      expect(resp.body).toEqual({
        error: "unsupported matching algorithm: linearQf",
      });
    });

    test("renders 400 for a malformed algorithm", async () => {
      const resp = (await request(app)
        .post("/api/v1/rounds")
        .send({
          ...createRoundBody,
          algorithm: {
            type: "capitalConstrainedLiberalRadicalism",
            parameter: 5,
          },
        })) as Response<{ error: string; issues: { path: string[] }[] }>;

      expect(resp.status).toEqual(400);
      expect(resp.body.error).toEqual("Invalid request");
      expect(resp.body.issues.map((issue) => issue.path)).toEqual([
        ["parameter"],
      ]);
    });

    test("renders 400 for a proposal id out of range", async () => {
      await request(app).post("/api/v1/rounds").send(createRoundBody).expect(201);

      const resp = (await request(app).get(
        "/api/v1/rounds/round-1/proposals/2147483648"
      )) as Response<{ error: string }>;

      expect(resp.status).toEqual(400);
      expect(resp.body.error).toEqual("Invalid request");

      const largest = await request(app).get(
        "/api/v1/rounds/round-1/proposals/2147483647"
      );
      expect(largest.status).toEqual(404);
    });

    test("renders 404 for an unknown round", async () => {
      const resp = await request(app).get("/api/v1/rounds/missing");

      expect(resp.status).toEqual(404);
      expect(resp.body).toEqual({ error: "Round missing not found" });
    });

    test("renders 409 for expired periods", async () => {
      now = 5_000;

      const resp = await request(app)
        .post("/api/v1/rounds")
        .send(createRoundBody);

      expect(resp.status).toEqual(409);
      expect(resp.body).toEqual({ error: "Proposal period expired" });
    });
  });

  describe("voting and distribution", () => {
    const votes: [string, string[]][] = [
      ["grant one", ["1200", "44999", "33"]],
      ["grant two", ["30000", "58999"]],
      ["grant three", ["230000", "100"]],
      ["grant four", ["100000", "5"]],
    ];

    beforeEach(async () => {
      await request(app).post("/api/v1/rounds").send(createRoundBody).expect(201);

      for (const [index, [title, amounts]] of votes.entries()) {
        const proposalId = index + 1;

        const created = await request(app)
          .post("/api/v1/rounds/round-1/proposals")
          .send({
            sender: testAddress(50),
            title,
            fundAddress: testAddress(100 + proposalId),
          });
        expect(created.status).toEqual(201);
        expect(created.body).toMatchObject({ proposalId });

        for (const [voterIndex, amount] of amounts.entries()) {
          await request(app)
            .post(`/api/v1/rounds/round-1/proposals/${proposalId}/votes`)
            .send({
              sender: testAddress(10 + voterIndex),
              funds: [{ denom: "ucosm", amount }],
            })
            .expect(201);
        }
      }
    });

    test("reports collected funds as strings", async () => {
      const resp = await request(app)
        .post("/api/v1/rounds/round-1/proposals/1/votes")
        .send({
          sender: testAddress(20),
          funds: [{ denom: "ucosm", amount: "8" }],
        });

      expect(resp.status).toEqual(201);
      expect(resp.body).toEqual({
        proposalId: 1,
        voter: testAddress(20),
        collectedFunds: "46240",
      });
    });

    test("rejects a second vote from the same address", async () => {
      const resp = await request(app)
        .post("/api/v1/rounds/round-1/proposals/1/votes")
        .send({
          sender: testAddress(10),
          funds: [{ denom: "ucosm", amount: "1" }],
        });

      expect(resp.status).toEqual(409);
      expect(resp.body).toEqual({
        error: "Address already voted on proposal 1",
      });
    });

    test("lists proposals", async () => {
      const resp = (await request(app).get(
        "/api/v1/rounds/round-1/proposals"
      )) as Response<{ proposals: { id: number; collectedFunds: string }[] }>;

      expect(resp.status).toEqual(200);
      expect(
        resp.body.proposals.map((p) => [p.id, p.collectedFunds])
      ).toEqual([
        [1, "46232"],
        [2, "88999"],
        [3, "230100"],
        [4, "100005"],
      ]);
    });

    test("previews matches", async () => {
      const resp = (await request(app).get(
        "/api/v1/rounds/round-1/matches"
      )) as Response<{ leftover: string; matches: { matched: string }[] }>;

      expect(resp.status).toEqual(200);
      expect(resp.body.leftover).toEqual("1");
      expect(resp.body.matches.map((m) => m.matched)).toEqual([
        "60212",
        "164602",
        "228537",
        "96648",
      ]);
    });

    test("previews unconstrained matches", async () => {
      const resp = (await request(app).get(
        "/api/v1/rounds/round-1/matches?unconstrained=true"
      )) as Response<{ type: string; matches: { matched: string }[] }>;

      expect(resp.status).toEqual(200);
      expect(resp.body.type).toEqual("unconstrained");
      expect(resp.body.matches.map((m) => m.matched)).toEqual([
        "63001",
        "172225",
        "239121",
        "101124",
      ]);
    });

    test("rejects a malformed unconstrained parameter", async () => {
      const resp = await request(app).get(
        "/api/v1/rounds/round-1/matches?unconstrained=maybe"
      );

      expect(resp.status).toEqual(400);
      expect(resp.body).toEqual({
        error: "unconstrained parameter must be true or false",
      });
    });

    test("distributes the round once voting ended", async () => {
      const early = await request(app)
        .post("/api/v1/rounds/round-1/distribution")
        .send({ sender: ADMIN });
      expect(early.status).toEqual(409);

      now = VOTING_DEADLINE;

      const resp = (await request(app)
        .post("/api/v1/rounds/round-1/distribution")
        .send({ sender: ADMIN })) as Response<{
        leftover: string;
        transfers: { toAddress: string; amount: string }[];
      }>;

      expect(resp.status).toEqual(201);
      expect(resp.body.leftover).toEqual("1");
      expect(
        resp.body.transfers.map((t) => [t.toAddress, t.amount])
      ).toEqual([
        [testAddress(101), "106444"],
        [testAddress(102), "253601"],
        [testAddress(103), "458637"],
        [testAddress(104), "196653"],
        [LEFTOVER, "1"],
      ]);

      const fetched = await request(app).get(
        "/api/v1/rounds/round-1/distribution"
      );
      expect(fetched.status).toEqual(200);
      expect(fetched.body).toEqual(resp.body);

      const again = await request(app)
        .post("/api/v1/rounds/round-1/distribution")
        .send({ sender: ADMIN });
      expect(again.status).toEqual(409);
    });

    test("renders 403 when someone else distributes", async () => {
      now = VOTING_DEADLINE;

      const resp = await request(app)
        .post("/api/v1/rounds/round-1/distribution")
        .send({ sender: testAddress(50) });

      expect(resp.status).toEqual(403);
      expect(resp.body).toEqual({ error: "Unauthorized" });
    });
  });
});
