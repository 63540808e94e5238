import type { PageView } from "@shortpage/shared";
import type { PageViewJob } from "./types.js";

const MAX_REFERER_LENGTH = 2048;

export function toPageViewJob(view: PageView): PageViewJob {
  return {
    slug: view.slug,
    realIp: view.realIp,
    referer: view.referer.slice(0, MAX_REFERER_LENGTH),
    mobile: view.mobile,
    platform: view.platform,
    os: view.os,
    browserName: view.browserName,
    timestamp: view.timestamp.getTime(),
  };
}

export function fromPageViewJob(job: PageViewJob): PageView {
  return {
    slug: job.slug,
    realIp: job.realIp,
    referer: job.referer,
    mobile: job.mobile,
    platform: job.platform,
    os: job.os,
    browserName: job.browserName,
    timestamp: new Date(job.timestamp),
  };
}
