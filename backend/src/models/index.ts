export { UserModel, type UserDoc } from './user.js';
export { CourseModel, type CourseDoc } from './course.js';
export { ScheduleEntryModel, type ScheduleEntryDoc } from './scheduleEntry.js';
export { AnnouncementModel, type AnnouncementDoc } from './announcement.js';
