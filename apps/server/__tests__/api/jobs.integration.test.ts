import request from "supertest";
import { createTestApp } from "../testApp";
import type { Express } from "express";
import { DEFAULT_SERVER_CONFIG } from "../../config";
import { SAMPLE_CSV, SAMPLE_ROWS, STANDARD_HEADERS } from "../../../../tests/fixtures/logbookFixtures";

describe("Conversion Jobs API Integration Tests", () => {
  let app: Express;

  beforeAll(async () => {
    app = await createTestApp();
  });

  async function createJob(): Promise<string> {
    const response = await request(app)
      .post("/api/logbook/analyze")
      .send({ csv: SAMPLE_CSV, file_name: "march.csv", pilot_name: "Test Pilot" })
      .expect(201);
    return response.body.job_id;
  }

  describe("GET /api/jobs/:id", () => {
    it("should return a stored job", async () => {
      const id = await createJob();

      const response = await request(app)
        .get(`/api/jobs/${id}`)
        .expect("Content-Type", /json/)
        .expect(200);

      expect(response.body.id).toBe(id);
      expect(response.body.file_name).toBe("march.csv");
      expect(response.body.status).toBe("partial");
      expect(response.body.result.form.totals.pic).toBe(4);
      expect(response.body.summary.lines).toHaveLength(3);
    });

    it("should return 404 for an unknown job", async () => {
      const response = await request(app).get("/api/jobs/missing1").expect(404);
      expect(response.body).toEqual({ error: "Job not found" });
    });
  });

  describe("GET /api/jobs/:id/form-cells", () => {
    it("should return the stored cells", async () => {
      const id = await createJob();

      const response = await request(app).get(`/api/jobs/${id}/form-cells`).expect(200);

      expect(response.body.pilot_name).toBe("Test Pilot");
      expect(response.body.cells).toHaveLength(35);
    });
  });

  describe("GET /api/jobs/:id/flights.csv", () => {
    it("should name the download after the uploaded file", async () => {
      const id = await createJob();

      const response = await request(app)
        .get(`/api/jobs/${id}/flights.csv`)
        .expect("Content-Type", /text\/csv/)
        .expect(200);

      expect(response.headers["content-disposition"]).toContain("march_classified.csv");
      expect(response.text.split("\n")).toHaveLength(7);
    });
  });

  describe("GET /api/jobs", () => {
    it("should list jobs with their totals", async () => {
      const id = await createJob();

      const response = await request(app).get("/api/jobs").expect(200);
      const listed = response.body.find((job: { id: string }) => job.id === id);

      expect(listed).toMatchObject({
        id,
        file_name: "march.csv",
        status: "partial",
        pilot_name: "Test Pilot",
        flights: 6,
        overall_total: 7,
      });
    });
  });

  describe("DELETE /api/jobs/:id", () => {
    it("should delete a job once", async () => {
      const id = await createJob();

      await request(app).delete(`/api/jobs/${id}`).expect(204);
      await request(app).get(`/api/jobs/${id}`).expect(404);
      await request(app).delete(`/api/jobs/${id}`).expect(404);
    });
  });

  describe("job status", () => {
    it("should mark a job without row errors as complete", async () => {
      const response = await request(app)
        .post("/api/logbook/analyze")
        .send({ headers: STANDARD_HEADERS, rows: SAMPLE_ROWS.slice(0, 6) })
        .expect(201);

      expect(response.body.status).toBe("complete");
    });
  });

  describe("server defaults", () => {
    it("should fall back to the configured pilot name", async () => {
      const configured = await createTestApp({ ...DEFAULT_SERVER_CONFIG, pilotName: "Default Pilot" });

      const response = await request(configured)
        .post("/api/logbook/analyze")
        .send({ csv: SAMPLE_CSV })
        .expect(201);

      expect(response.body.result.pilot_name).toBe("Default Pilot");
    });
  });
});
