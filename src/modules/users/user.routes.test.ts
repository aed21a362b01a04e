import assert from "node:assert/strict";
import { describe, test } from "node:test";
import request from "supertest";
import { createTestApp, sessionFor, TEST_PASSWORD } from "../../test/helpers";

describe("user management", () => {
  test("is forbidden for non-admin sessions", async () => {
    const { ctx, app } = createTestApp();
    const auth = await sessionFor(ctx, app, "isci");

    const list = await request(app).get("/api/v1/kullanicilar").set("Authorization", auth);
    assert.equal(list.status, 403);
    assert.equal(list.body.error, "Bu işlem için yetkiniz yok");

    const create = await request(app)
      .post("/api/v1/kullanicilar")
      .set("Authorization", auth)
      .send({ username: "yeni", password: TEST_PASSWORD });
    assert.equal(create.status, 403);

    const attempts = await request(app).get("/api/v1/kullanicilar/giris-denemeleri").set("Authorization", auth);
    assert.equal(attempts.status, 403);
  });

  test("lets an admin create, update and delete users", async () => {
    const { ctx, app } = createTestApp();
    const auth = await sessionFor(ctx, app, "yonetici", "admin");

    const created = await request(app)
      .post("/api/v1/kullanicilar")
      .set("Authorization", auth)
      .send({ username: "ayse", password: TEST_PASSWORD, email: " Ayse@Example.com ", fullName: "Ayşe Yılmaz" });
    assert.equal(created.status, 201);
    assert.equal(created.body.data.role, "kullanici");
    assert.equal(created.body.data.email, "ayse@example.com");
    const userId: number = created.body.data.id;

    const duplicate = await request(app)
      .post("/api/v1/kullanicilar")
      .set("Authorization", auth)
      .send({ username: "ayse", password: TEST_PASSWORD });
    assert.equal(duplicate.status, 409);
    assert.equal(duplicate.body.error, "Bu kullanıcı adı zaten kullanılıyor");

    const updated = await request(app)
      .patch(`/api/v1/kullanicilar/${userId}`)
      .set("Authorization", auth)
      .send({ role: "admin", fullName: "Ayşe Y." });
    assert.equal(updated.status, 200);
    assert.equal(updated.body.data.role, "admin");
    assert.equal(updated.body.data.fullName, "Ayşe Y.");

    const list = await request(app).get("/api/v1/kullanicilar").set("Authorization", auth);
    assert.equal(list.status, 200);
    assert.deepEqual(
      list.body.data.map((u: { username: string }) => u.username).sort(),
      ["ayse", "yonetici"],
    );

    const removed = await request(app).delete(`/api/v1/kullanicilar/${userId}`).set("Authorization", auth);
    assert.equal(removed.status, 204);

    const missing = await request(app).get(`/api/v1/kullanicilar/${userId}`).set("Authorization", auth);
    assert.equal(missing.status, 404);
    assert.equal(missing.body.error, "Kullanıcı bulunamadı");
  });

  test("keeps at least one active admin", async () => {
    const { ctx, app } = createTestApp();
    const auth = await sessionFor(ctx, app, "yonetici", "admin");
    const me = await request(app).get("/api/v1/oturum/ben").set("Authorization", auth);

    const demote = await request(app)
      .patch(`/api/v1/kullanicilar/${me.body.data.id}`)
      .set("Authorization", auth)
      .send({ role: "kullanici" });
    assert.equal(demote.status, 409);
    assert.equal(demote.body.error, "En az bir aktif yönetici kalmalıdır");

    const removeSelf = await request(app).delete(`/api/v1/kullanicilar/${me.body.data.id}`).set("Authorization", auth);
    assert.equal(removeSelf.status, 400);
    assert.equal(removeSelf.body.error, "Kendi hesabınızı silemezsiniz");
  });

  test("deactivating a user ends their sessions", async () => {
    const { ctx, app } = createTestApp();
    const admin = await sessionFor(ctx, app, "yonetici", "admin");
    const worker = await sessionFor(ctx, app, "isci");
    const me = await request(app).get("/api/v1/oturum/ben").set("Authorization", worker);

    const res = await request(app)
      .patch(`/api/v1/kullanicilar/${me.body.data.id}`)
      .set("Authorization", admin)
      .send({ active: false });
    assert.equal(res.status, 200);
    assert.equal(res.body.data.active, false);

    const after = await request(app).get("/api/v1/panel").set("Authorization", worker);
    assert.equal(after.status, 401);
  });

  test("lists login attempts newest first", async () => {
    const { ctx, app } = createTestApp();
    const auth = await sessionFor(ctx, app, "yonetici", "admin");
    await request(app).post("/api/v1/oturum/giris").send({ username: "yonetici", password: "yanlis-sifre" });

    const res = await request(app)
      .get("/api/v1/kullanicilar/giris-denemeleri?username=yonetici")
      .set("Authorization", auth);

    assert.equal(res.status, 200);
    assert.deepEqual(
      res.body.data.map((a: { success: boolean }) => a.success),
      [false, true],
    );
  });
});
