import type { APIRoute } from "astro";
import { healthResponse } from "../lib/health";

export const prerender = false;

export const GET: APIRoute = ({ locals }) => healthResponse(locals.app);
