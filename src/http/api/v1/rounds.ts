import express, { type Request, type Response } from "express";
import { z } from "zod";

import ClientError from "../clientError.js";
import type { HttpApiConfig } from "../../app.js";
import {
  createProposalRequestSchema,
  createRoundRequestSchema,
} from "../../../round/config.js";
import { coinSchema } from "../../../round/funds.js";
import { stringifyJsonWithBigInts } from "../../../utils/index.js";

const senderSchema = z.object({
  // authenticated upstream; the round only checks it against its whitelists
  sender: z.string(),
});

const fundedSenderSchema = senderSchema.extend({
  funds: z.array(coinSchema).default([]),
});

const createRoundBody = createRoundRequestSchema.merge(fundedSenderSchema);
const createProposalBody = createProposalRequestSchema.merge(senderSchema);

// ids live in a 32-bit integer column
const proposalIdSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(2_147_483_647);

function sendJson(res: Response, statusCode: number, body: unknown) {
  res.setHeader("content-type", "application/json");
  res.status(statusCode);
  res.send(stringifyJsonWithBigInts(body));
}

function boolParam(
  query: Request["query"],
  name: string
): boolean | undefined {
  const value = query[name];

  if (value === undefined) {
    return undefined;
  }

  const param = typeof value === "string" ? value.toLowerCase() : null;

  if (param === "true") {
    return true;
  } else if (param === "false") {
    return false;
  } else {
    throw new ClientError(`${name} parameter must be true or false`, 400);
  }
}

export const createHandler = (config: HttpApiConfig): express.Router => {
  const router = express.Router();
  const { roundService } = config;

  router.post("/rounds", async (req, res) => {
    const body = createRoundBody.parse(req.body);

    const round = await roundService.createRound({
      sender: body.sender,
      funds: body.funds,
      request: body,
    });

    sendJson(res, 201, round);
  });

  router.get("/rounds/:roundId", async (req, res) => {
    const round = await roundService.getRound(req.params.roundId);
    sendJson(res, 200, round);
  });

  router.post("/rounds/:roundId/proposals", async (req, res) => {
    const body = createProposalBody.parse(req.body);

    const proposal = await roundService.createProposal({
      roundId: req.params.roundId,
      sender: body.sender,
      request: body,
    });

    sendJson(res, 201, { proposalId: proposal.id, proposal });
  });

  router.get("/rounds/:roundId/proposals", async (req, res) => {
    const proposals = await roundService.listProposals(req.params.roundId);
    sendJson(res, 200, { proposals });
  });

  router.get("/rounds/:roundId/proposals/:proposalId", async (req, res) => {
    const proposal = await roundService.getProposal(
      req.params.roundId,
      proposalIdSchema.parse(req.params.proposalId)
    );
    sendJson(res, 200, proposal);
  });

  router.post(
    "/rounds/:roundId/proposals/:proposalId/votes",
    async (req, res) => {
      const body = fundedSenderSchema.parse(req.body);

      const proposal = await roundService.voteProposal({
        roundId: req.params.roundId,
        proposalId: proposalIdSchema.parse(req.params.proposalId),
        sender: body.sender,
        funds: body.funds,
      });

      sendJson(res, 201, {
        proposalId: proposal.id,
        voter: body.sender.toLowerCase(),
        collectedFunds: proposal.collectedFunds,
      });
    }
  );

  router.get("/rounds/:roundId/matches", async (req, res) => {
    const matches = await roundService.previewMatches({
      roundId: req.params.roundId,
      unconstrained: boolParam(req.query, "unconstrained"),
    });
    sendJson(res, 200, matches);
  });

  router.post("/rounds/:roundId/distribution", async (req, res) => {
    const body = senderSchema.parse(req.body);

    const distribution = await roundService.triggerDistribution({
      roundId: req.params.roundId,
      sender: body.sender,
    });

    sendJson(res, 201, distribution);
  });

  router.get("/rounds/:roundId/distribution", async (req, res) => {
    const distribution = await roundService.getDistribution(
      req.params.roundId
    );
    sendJson(res, 200, distribution);
  });

  return router;
};
